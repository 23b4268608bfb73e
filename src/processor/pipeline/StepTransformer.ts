/**
 * StepTransformer - 차분 변환기 (s)
 *
 * 정렬하지 않습니다. 두 번째 행부터 (x_i, y_i - y_{i-1}) 을 내보냅니다.
 */

import { XYTable } from '../../core/XYTable';
import type { Transformer } from './Transformer';
import { assertFinite } from './Transformer';

export class StepTransformer implements Transformer {
  readonly name = 'Step';
  readonly letter = 's';

  transform(table: XYTable): XYTable {
    const { xs, ys } = table;
    const outX: number[] = [];
    const outY: number[] = [];

    for (let i = 1; i < xs.length; i++) {
      outX.push(xs[i]);
      outY.push(ys[i] - ys[i - 1]);
    }

    return assertFinite(
      XYTable.fromColumns(outX, outY, { x: table.names.x, y: `${table.names.y}:Step` }),
      this.name
    );
  }
}
