/**
 * seqplot - 단일 시리즈 명령
 *
 * @example
 * seqplot -i data.csv --header true -x '$time' -y '$value' -e 'iCd1000CcC' --mode dump
 */

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import type { DumpOperator, LineageRef, Operator } from '../types';
import type { RunConfig, RunMode } from '../core/config';
import { isInputFormat, isRunMode, resolveRunConfig } from '../core/config';
import { SourceError } from '../core/errors';
import { createLogger, logger } from '../core/logger';
import { FileCacheStore } from '../processor/cache/FileCacheStore';
import { CacheWriteDumper } from '../processor/dump/CacheWriteDumper';
import { OutputDumper } from '../processor/dump/OutputDumper';
import { PlotDumper } from '../processor/dump/PlotDumper';
import { ArqueroEngine } from '../processor/engines/ArqueroEngine';
import { OPERATOR_HELP } from '../processor/parser/operatorTable';
import { formatSequence, isDump, parseOperatorSequence } from '../processor/parser/OperatorParser';
import { CachedPipeline, type PipelineSource } from '../processor/pipeline/CachedPipeline';
import { TransformerFactory } from '../processor/pipeline/TransformerFactory';
import { GnuplotRenderer } from '../render/GnuplotRenderer';
import { SourceReader, type SourceRequest } from '../source/SourceReader';
import type { CliIO } from './io';
import { EXIT_OK, UsageError, parseBooleanFlag, reportError } from './io';
import { PLOT_FLAG_OPTIONS, PLOT_FLAG_USAGE, parsePlotFlags } from './plotFlags';

const log = createLogger('seqplot');

export const SEQPLOT_USAGE = `Usage: seqplot [options]

Options:
  -i, --input <path>      input CSV, '-' for stdin (default: -)
                          with --format lineage, the directory holding lineage.json
  -e, --opseq <OPSEQ>     operator sequence
  -x, --xcol <selector>   x column: $N, $name, \${name} or a number (default: $1)
  -y, --ycol <selector>   y column (default: $2)
      --header <bool>     input has a header row (default: false)
      --format <fmt>      csv | lineage (default: csv)
      --mode <mode>       plot | dump | dry-run (default: plot)
  -o, --outdir <dir>      cache, lineage and plot data directory (default: .)
  -g, --gnuplot <line>    extra gnuplot command, repeatable
      --terminal <term>   gnuplot terminal (default: dumb)
      --no-header-out     omit the header row when printing
      --no-cache          do not reuse cached prefixes
  -h, --help              show this help

${PLOT_FLAG_USAGE}

${OPERATOR_HELP}`;

// =============================================================================
// 명령행 해석
// =============================================================================

/**
 * 명령행 → 설정
 *
 * @returns help 요청이면 null
 * @throws UsageError
 */
export function parseSeqplotArgs(argv: readonly string[], env: NodeJS.ProcessEnv): RunConfig | null {
  const { values } = parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      ...PLOT_FLAG_OPTIONS,
      input: { type: 'string', short: 'i' },
      opseq: { type: 'string', short: 'e' },
      xcol: { type: 'string', short: 'x' },
      ycol: { type: 'string', short: 'y' },
      header: { type: 'string' },
      format: { type: 'string' },
      mode: { type: 'string' },
      outdir: { type: 'string', short: 'o' },
      gnuplot: { type: 'string', short: 'g', multiple: true },
      terminal: { type: 'string' },
      'no-header-out': { type: 'boolean' },
      'no-cache': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) return null;

  const overrides: Partial<RunConfig> = {};
  if (values.input !== undefined) overrides.input = values.input;
  if (values.opseq !== undefined) overrides.opseq = values.opseq;
  if (values.xcol !== undefined) overrides.x = values.xcol;
  if (values.ycol !== undefined) overrides.y = values.ycol;
  if (values.header !== undefined) overrides.hasHeader = parseBooleanFlag('header', values.header);
  if (values.terminal !== undefined) overrides.terminal = values.terminal;
  if (values.gnuplot !== undefined) overrides.gnuplotLines = values.gnuplot;
  if (values['no-header-out']) overrides.headerOut = false;
  if (values['no-cache']) overrides.useCache = false;
  overrides.appearance = parsePlotFlags(values);

  if (values.format !== undefined) {
    if (!isInputFormat(values.format)) {
      throw new UsageError(`unknown format '${values.format}'`);
    }
    overrides.format = values.format;
  }
  if (values.mode !== undefined) {
    if (!isRunMode(values.mode)) {
      throw new UsageError(`unknown mode '${values.mode}'`);
    }
    overrides.mode = values.mode;
  }

  // lineage 입력이면 캐시도 그 디렉터리에서 찾음
  if (values.outdir !== undefined) {
    overrides.outdir = values.outdir;
  } else if (overrides.format === 'lineage' && overrides.input !== undefined) {
    overrides.outdir = overrides.input;
  }

  return resolveRunConfig(overrides, env);
}

/**
 * 모드에 따라 덤프가 없는 시퀀스 끝에 O 또는 P 를 붙임
 */
export function withImpliedDump(operators: readonly Operator[], mode: RunMode, input: string): Operator[] {
  if (operators.some(isDump)) return [...operators];

  const implied: DumpOperator =
    mode === 'dump'
      ? { kind: 'dump', letter: 'O', position: input.length, canonical: 'O' }
      : { kind: 'dump', letter: 'P', position: input.length, canonical: 'P' };
  return [...operators, implied];
}

// =============================================================================
// 실행
// =============================================================================

/**
 * seqplot 실행
 *
 * @returns 종료 코드 (0 성공, 1 실패, 2 사용법 오류)
 */
export async function runSeqplot(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    const config = parseSeqplotArgs(argv, io.env);
    if (config === null) {
      io.stdout.write(`${SEQPLOT_USAGE}\n`);
      return EXIT_OK;
    }
    logger.setLevel(config.logLevel);

    await executeSeqplot(config, io);
    return EXIT_OK;
  } catch (error) {
    return reportError(error, io, SEQPLOT_USAGE);
  }
}

/**
 * 설정대로 한 번 실행
 */
export async function executeSeqplot(config: RunConfig, io: CliIO): Promise<void> {
  const operators = withImpliedDump(parseOperatorSequence(config.opseq), config.mode, config.opseq);
  const engine = new ArqueroEngine();
  const reader = new SourceReader({ engine, readStdin: io.readStdin, cwd: io.cwd });
  const outdir = resolve(io.cwd, config.outdir);
  const store = new FileCacheStore(outdir, { engine });

  const source = await openSource(config, reader, io.cwd);
  const renderer = config.mode === 'plot' ? (io.renderer ?? new GnuplotRenderer(config.gnuplotBinary)) : null;

  const factory = new TransformerFactory({
    engine,
    dumpers: {
      C: new CacheWriteDumper(store),
      O: new OutputDumper(io.stdout, { header: config.headerOut, engine }),
      P: new PlotDumper({
        outdir,
        renderer,
        sink: io.stdout,
        template: { ...config.appearance, terminal: config.terminal, customLines: config.gnuplotLines },
        engine,
      }),
    },
  });

  const pipeline = new CachedPipeline(factory, {
    store,
    useCache: config.useCache,
    debug: logger.isEnabled('debug'),
  });
  const result = await pipeline.execute(operators, source);

  log.info(`'${formatSequence(operators)}' done`, {
    resolvedKey: result.resolvedKey,
    skipped: result.skipped,
    executed: result.executed,
    rows: result.table.rowCount,
  });
  if (result.stepTimings) {
    log.debug('step timings (ms)', Object.fromEntries(result.stepTimings));
  }
}

/**
 * 입력 형식에 따라 원본과 계보 결정
 */
async function openSource(config: RunConfig, reader: SourceReader, cwd: string): Promise<PipelineSource> {
  if (config.format === 'csv') {
    const request: SourceRequest = {
      input: config.input,
      hasHeader: config.hasHeader,
      x: config.x,
      y: config.y,
    };
    return { lineage: reader.lineageFor(request), load: () => reader.read(request) };
  }

  const lineageDir = resolve(cwd, config.input);
  const lineage: LineageRef | null = await new FileCacheStore(lineageDir).readLineage();
  if (lineage === null) {
    throw new SourceError(`no lineage record in ${lineageDir}`);
  }

  const { record } = lineage;
  const request: SourceRequest = { input: record.source, hasHeader: record.hasHeader, x: record.x, y: record.y };
  return { lineage, load: () => reader.read(request) };
}
