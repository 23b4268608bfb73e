/**
 * OutputDumper - 터미널 출력 덤프 (O)
 *
 * 현재 테이블을 CSV 로 출력 싱크(기본: stdout)에 씁니다. 테이블은 바꾸지 않습니다.
 */

import type { IEngine } from '../engines/IEngine';
import { ArqueroEngine } from '../engines/ArqueroEngine';
import type { DumpContext, Dumper } from '../pipeline/Transformer';

/**
 * 텍스트 출력 대상
 */
export interface OutputSink {
  write(text: string): void;
}

export interface OutputDumperOptions {
  /** 헤더 행 출력 여부 (기본: true) */
  header?: boolean;

  engine?: IEngine;
}

export class OutputDumper implements Dumper {
  readonly name = 'Output';
  readonly letter = 'O';

  private readonly sink: OutputSink;

  private readonly header: boolean;

  private readonly engine: IEngine;

  constructor(sink: OutputSink, options: OutputDumperOptions = {}) {
    this.sink = sink;
    this.header = options.header ?? true;
    this.engine = options.engine ?? new ArqueroEngine();
  }

  dump(ctx: DumpContext): void {
    this.sink.write(this.engine.formatTable(ctx.table, this.header));
  }
}
