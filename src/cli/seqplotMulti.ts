/**
 * seqplot-multi - 여러 시리즈를 한 플롯에
 *
 * @example
 * seqplot-multi -o out \
 *   --series 'file=a.csv;opseq=o;title=A' \
 *   --series 'file=b.csv;y=$3;opseq=id;plot=lines;axis=x1y2'
 */

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import type { AxisPair, PlotType, SeriesSpec } from '../types';
import { resolveRunConfig } from '../core/config';
import { logger } from '../core/logger';
import { MultiSeriesRunner } from '../processor/MultiSeriesRunner';
import { GnuplotRenderer } from '../render/GnuplotRenderer';
import { STDIN_INPUT, SourceReader } from '../source/SourceReader';
import type { CliIO } from './io';
import { EXIT_OK, UsageError, parseBooleanFlag, reportError } from './io';
import { PLOT_FLAG_OPTIONS, PLOT_FLAG_USAGE, parsePlotFlags } from './plotFlags';

export const SEQPLOT_MULTI_USAGE = `Usage: seqplot-multi [options] --series <spec> [--series <spec> ...]

Series spec: key=value pairs separated by ';'
  file=<path>     input CSV, '-' for stdin (required; one series at most reads stdin)
  x=<selector>    x column (default: $1)
  y=<selector>    y column (default: $2)
  opseq=<OPSEQ>   operator sequence, without P
  title=<text>    legend title
  plot=<type>     points | lines | linespoints (default: points)
  axis=<axes>     x1y1 | x1y2 | x2y1 | x2y2 (default: x1y1)
  style=<text>    extra plot style, e.g. lw 2
Keys may be shortened to any unique prefix (o=, t=, p=, ...).

Options:
      --series <spec>     add a data series, repeatable
      --header <bool>     inputs have a header row (default: false)
  -o, --outdir <dir>      data and cache directory (default: .)
  -g, --gnuplot <line>    extra gnuplot command, repeatable
      --terminal <term>   gnuplot terminal (default: dumb)
      --no-cache          do not reuse cached prefixes
      --dry-run           print the gnuplot script instead of running gnuplot
  -h, --help              show this help

${PLOT_FLAG_USAGE}`;

// =============================================================================
// 시리즈 스펙 해석
// =============================================================================

const SERIES_KEYS = ['file', 'x', 'y', 'opseq', 'title', 'plot', 'axis', 'style'] as const;

type SeriesKey = (typeof SERIES_KEYS)[number];

const PLOT_TYPES: readonly PlotType[] = ['points', 'lines', 'linespoints'];

const AXIS_PATTERN = /^x([12])y([12])$/;

/**
 * 축약된 키를 전체 키로
 *
 * @throws UsageError 모르는 키거나 여러 키와 겹칠 때
 */
export function expandSeriesKey(key: string): SeriesKey {
  const exact = SERIES_KEYS.find(k => k === key);
  if (exact) return exact;

  const candidates = key === '' ? [] : SERIES_KEYS.filter(k => k.startsWith(key));
  if (candidates.length === 1) return candidates[0];
  if (candidates.length > 1) {
    throw new UsageError(`series key '${key}' is ambiguous (${candidates.join(', ')})`);
  }
  throw new UsageError(`unknown series key '${key}'`);
}

/**
 * `file=a.csv;opseq=o;title=A` 해석
 *
 * @throws UsageError
 */
export function parseSeriesSpec(text: string): SeriesSpec {
  const values = new Map<SeriesKey, string>();

  for (const part of text.split(';')) {
    if (part.trim() === '') continue;

    const eq = part.indexOf('=');
    if (eq < 0) {
      throw new UsageError(`series item '${part}' is not key=value`);
    }
    const key = expandSeriesKey(part.slice(0, eq).trim());
    if (values.has(key)) {
      throw new UsageError(`series key '${key}' given twice`);
    }
    values.set(key, part.slice(eq + 1));
  }

  const file = values.get('file');
  if (file === undefined || file === '') {
    throw new UsageError(`series '${text}' has no file`);
  }

  return {
    file,
    x: values.get('x') ?? '$1',
    y: values.get('y') ?? '$2',
    opseq: values.get('opseq') ?? '',
    title: values.get('title'),
    style: values.get('style'),
    plotType: parsePlotType(values.get('plot') ?? 'points'),
    axis: parseAxis(values.get('axis') ?? 'x1y1'),
  };
}

function parsePlotType(text: string): PlotType {
  const found = PLOT_TYPES.find(type => type === text);
  if (!found) {
    throw new UsageError(`unknown plot type '${text}'`);
  }
  return found;
}

function parseAxis(text: string): AxisPair {
  const match = AXIS_PATTERN.exec(text);
  if (!match) {
    throw new UsageError(`axis must look like x1y2, got '${text}'`);
  }
  return { x: match[1] === '2' ? 2 : 1, y: match[2] === '2' ? 2 : 1 };
}

// =============================================================================
// 실행
// =============================================================================

/**
 * seqplot-multi 실행
 *
 * @returns 종료 코드 (0 성공, 1 실패, 2 사용법 오류)
 */
export async function runSeqplotMulti(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    const { values } = parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        ...PLOT_FLAG_OPTIONS,
        series: { type: 'string', multiple: true },
        header: { type: 'string' },
        outdir: { type: 'string', short: 'o' },
        gnuplot: { type: 'string', short: 'g', multiple: true },
        terminal: { type: 'string' },
        'no-cache': { type: 'boolean' },
        'dry-run': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });

    if (values.help) {
      io.stdout.write(`${SEQPLOT_MULTI_USAGE}\n`);
      return EXIT_OK;
    }

    const specs = (values.series ?? []).map(parseSeriesSpec);
    if (specs.length === 0) {
      throw new UsageError('at least one --series is required');
    }
    if (specs.filter(spec => spec.file === STDIN_INPUT).length > 1) {
      throw new UsageError('only one series may read stdin');
    }

    const config = resolveRunConfig({}, io.env);
    logger.setLevel(config.logLevel);

    const renderer = values['dry-run'] ? null : (io.renderer ?? new GnuplotRenderer(config.gnuplotBinary));
    const runner = new MultiSeriesRunner({
      outdir: resolve(io.cwd, values.outdir ?? config.outdir),
      hasHeader: values.header === undefined ? config.hasHeader : parseBooleanFlag('header', values.header),
      useCache: !values['no-cache'],
      renderer,
      sink: io.stdout,
      template: {
        ...parsePlotFlags(values),
        terminal: values.terminal ?? config.terminal,
        customLines: values.gnuplot ?? [],
      },
      reader: new SourceReader({ readStdin: io.readStdin, cwd: io.cwd }),
    });

    await runner.run(specs);
    return EXIT_OK;
  } catch (error) {
    return reportError(error, io, SEQPLOT_MULTI_USAGE);
  }
}
