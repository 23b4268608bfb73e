/**
 * UniqueTransformer - 중복 제거 변환기 (u)
 *
 * x 별로 처음 나온 행만 남깁니다. 정렬하지 않으며 원래 순서를 유지합니다.
 */

import type { XYTable } from '../../core/XYTable';
import type { IEngine } from '../engines/IEngine';
import { ArqueroEngine } from '../engines/ArqueroEngine';
import type { Transformer } from './Transformer';

export class UniqueTransformer implements Transformer {
  readonly name = 'Unique';
  readonly letter = 'u';

  private readonly engine: IEngine;

  constructor(engine: IEngine = new ArqueroEngine()) {
    this.engine = engine;
  }

  transform(table: XYTable): XYTable {
    return this.engine.uniqueByX(table);
  }
}
