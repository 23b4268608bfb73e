/**
 * PlotDumper - 플롯 덤프 (P)
 *
 * 1. 현재 테이블을 출력 디렉터리에 2컬럼 CSV(헤더 포함)로 쓴다
 * 2. 그 파일을 `using 1:2` 로 참조하는 gnuplot 스크립트를 만든다
 * 3. 렌더러에 넘긴다. 렌더러가 없으면(dry run) 스크립트를 출력 싱크에 쓴다
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { PlotTemplateOptions, SeriesOptions } from '../../types';
import { ExternalCollaboratorError } from '../../core/errors';
import { createLogger } from '../../core/logger';
import { buildPlotScript } from '../../render/GnuplotTemplate';
import type { Renderer } from '../../render/GnuplotRenderer';
import type { IEngine } from '../engines/IEngine';
import { ArqueroEngine } from '../engines/ArqueroEngine';
import type { DumpContext, Dumper } from '../pipeline/Transformer';
import type { OutputSink } from './OutputDumper';

const log = createLogger('PlotDumper');

export interface PlotDumperOptions {
  /** 데이터 파일을 쓸 디렉터리 */
  outdir: string;

  /** null 이면 스크립트를 sink 에 씀 */
  renderer: Renderer | null;

  sink: OutputSink;

  /** 시리즈 외 템플릿 설정 */
  template?: Omit<PlotTemplateOptions, 'series'>;

  /** 데이터 경로 외 시리즈 설정 */
  series?: Omit<SeriesOptions, 'dataPath'>;

  engine?: IEngine;
}

export class PlotDumper implements Dumper {
  readonly name = 'Plot';
  readonly letter = 'P';

  private readonly options: PlotDumperOptions;

  private readonly engine: IEngine;

  /** 이번 실행에서 그린 횟수 (데이터 파일 이름용) */
  private plotCount = 0;

  constructor(options: PlotDumperOptions) {
    this.options = options;
    this.engine = options.engine ?? new ArqueroEngine();
  }

  async dump(ctx: DumpContext): Promise<void> {
    this.plotCount++;
    const dataPath = join(this.options.outdir, `plot-${this.plotCount}.csv`);

    try {
      await mkdir(this.options.outdir, { recursive: true });
      await writeFile(dataPath, this.engine.formatTable(ctx.table, true), 'utf8');
    } catch (error) {
      throw new ExternalCollaboratorError('plot', `cannot write ${dataPath}`, error);
    }

    const script = buildPlotScript({
      ...this.options.template,
      series: [{ ...this.options.series, dataPath }],
    });

    if (this.options.renderer === null) {
      this.options.sink.write(script);
      return;
    }

    log.info(`rendering '${ctx.sequence}'`, { dataPath });
    await this.options.renderer.render(script);
  }
}
