/**
 * CdfTransformer - 누적 분포 변환기 (c)
 *
 * y 값을 정렬해 새 x 로 쓰고, 1부터 시작하는 순위/전체 개수를 새 y 로 씁니다.
 *
 * @example
 * // y = [3, 1, 2]
 * // → [(1, 1/3), (2, 2/3), (3, 1)]
 */

import { XYTable } from '../../core/XYTable';
import { NonFiniteValueError } from '../../core/errors';
import type { Transformer } from './Transformer';
import { assertFinite } from './Transformer';

export class CdfTransformer implements Transformer {
  readonly name = 'CDF';
  readonly letter = 'c';

  transform(table: XYTable): XYTable {
    const values = table.ys.slice();
    for (let i = 0; i < values.length; i++) {
      if (!Number.isFinite(values[i])) {
        throw new NonFiniteValueError(this.name, 'y', i);
      }
    }
    values.sort((a, b) => a - b);

    const n = values.length;
    const ranks = values.map((_, i) => (i + 1) / n);

    return assertFinite(
      XYTable.fromColumns(values, ranks, { x: table.names.y, y: 'CDF' }),
      this.name
    );
  }
}
