/**
 * RotateTransformer - 축 교환 변환기 (r)
 *
 * x 와 y 컬럼(이름 포함)을 맞바꿉니다.
 */

import { XYTable } from '../../core/XYTable';
import type { Transformer } from './Transformer';

export class RotateTransformer implements Transformer {
  readonly name = 'Rotate';
  readonly letter = 'r';

  transform(table: XYTable): XYTable {
    return XYTable.fromColumns(table.ys, table.xs, { x: table.names.y, y: table.names.x });
  }
}
