/**
 * MultiSeriesRunner - 여러 시리즈를 동시에 실행하고 플롯 하나로 합치기
 *
 * 시리즈마다 독립된 CachedPipeline 을 돌립니다. 모두 끝날 때까지 기다린 뒤
 * 하나라도 실패했으면 시리즈 순서상 첫 실패를 던집니다.
 * 같은 원본을 읽는 시리즈들은 캐시 저장소 인스턴스 하나를 함께 씁니다.
 *
 * 출력 디렉터리:
 *   series-<n>.csv           시리즈 n 의 최종 테이블 (플롯 데이터)
 *   cache-<계보 id 앞 16자>/  원본별 캐시 저장소
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { PlotTemplateOptions, SeriesSpec } from '../types';
import { ExternalCollaboratorError, ParseError } from '../core/errors';
import { createLogger } from '../core/logger';
import { buildPlotScript } from '../render/GnuplotTemplate';
import type { Renderer } from '../render/GnuplotRenderer';
import { SourceReader, type SourceRequest } from '../source/SourceReader';
import { FileCacheStore } from './cache/FileCacheStore';
import { CacheWriteDumper } from './dump/CacheWriteDumper';
import { OutputDumper, type OutputSink } from './dump/OutputDumper';
import type { IEngine } from './engines/IEngine';
import { ArqueroEngine } from './engines/ArqueroEngine';
import { parseOperatorSequence } from './parser/OperatorParser';
import { CachedPipeline } from './pipeline/CachedPipeline';
import type { PipelineResult } from './pipeline/Transformer';
import { TransformerFactory } from './pipeline/TransformerFactory';

const log = createLogger('MultiSeriesRunner');

export interface MultiSeriesOptions {
  outdir: string;

  /** 모든 입력에 헤더 행이 있는지 */
  hasHeader: boolean;

  useCache: boolean;

  /** null 이면 스크립트를 sink 에 씀 */
  renderer: Renderer | null;

  sink: OutputSink;

  template?: Omit<PlotTemplateOptions, 'series'>;

  reader?: SourceReader;

  engine?: IEngine;
}

export interface SeriesResult {
  /** 1부터 시작하는 시리즈 번호 */
  readonly index: number;

  readonly dataPath: string;

  readonly result: PipelineResult;
}

export interface MultiSeriesResult {
  readonly script: string;

  readonly series: readonly SeriesResult[];
}

export class MultiSeriesRunner {
  private readonly options: MultiSeriesOptions;

  private readonly engine: IEngine;

  private readonly reader: SourceReader;

  constructor(options: MultiSeriesOptions) {
    this.options = options;
    this.engine = options.engine ?? new ArqueroEngine();
    this.reader = options.reader ?? new SourceReader({ engine: this.engine });
  }

  /**
   * 모든 시리즈 실행 후 플롯
   *
   * @throws RangeError 시리즈가 없을 때
   */
  async run(specs: readonly SeriesSpec[]): Promise<MultiSeriesResult> {
    if (specs.length === 0) {
      throw new RangeError('at least one series is required');
    }

    const stores = new Map<string, FileCacheStore>();
    const settled = await Promise.allSettled(specs.map((spec, i) => this.runSeries(spec, i + 1, stores)));

    const series: SeriesResult[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        const failures = settled.filter(o => o.status === 'rejected').length;
        log.error(`${failures} of ${specs.length} series failed`);
        throw outcome.reason;
      }
      series.push(outcome.value);
    }

    const script = buildPlotScript({
      ...this.options.template,
      series: series.map(({ index, dataPath }) => {
        const spec = specs[index - 1];
        return { dataPath, title: spec.title, plotType: spec.plotType, axis: spec.axis, extra: spec.style };
      }),
    });

    if (this.options.renderer === null) {
      this.options.sink.write(script);
    } else {
      await this.options.renderer.render(script);
    }

    return { script, series };
  }

  private async runSeries(
    spec: SeriesSpec,
    index: number,
    stores: Map<string, FileCacheStore>
  ): Promise<SeriesResult> {
    const operators = parseOperatorSequence(spec.opseq);
    const plot = operators.find(op => op.letter === 'P');
    if (plot) {
      throw new ParseError('plot operator is not allowed inside a series', spec.opseq, plot.position);
    }

    const request: SourceRequest = {
      input: spec.file,
      hasHeader: this.options.hasHeader,
      x: spec.x,
      y: spec.y,
    };
    const lineage = this.reader.lineageFor(request);
    // 계보가 없으면(stdin) 저장소는 쓰이지 않고 C 는 기록을 거부합니다.
    const cacheDir = lineage === null ? 'cache-stdin' : `cache-${lineage.id.slice(0, 16)}`;
    let store = stores.get(cacheDir);
    if (!store) {
      store = new FileCacheStore(join(this.options.outdir, cacheDir), { engine: this.engine });
      stores.set(cacheDir, store);
    }

    const factory = new TransformerFactory({
      engine: this.engine,
      dumpers: {
        C: new CacheWriteDumper(store),
        O: new OutputDumper(this.options.sink, { engine: this.engine }),
      },
    });

    const result = await new CachedPipeline(factory, { store, useCache: this.options.useCache }).execute(
      operators,
      { lineage, load: () => this.reader.read(request) }
    );

    const dataPath = join(this.options.outdir, `series-${index}.csv`);
    try {
      await mkdir(this.options.outdir, { recursive: true });
      await writeFile(dataPath, this.engine.formatTable(result.table, true), 'utf8');
    } catch (error) {
      throw new ExternalCollaboratorError('plot', `cannot write ${dataPath}`, error);
    }

    log.info(`series ${index} done`, { rows: result.table.rowCount, skipped: result.skipped });
    return { index, dataPath, result };
  }
}
