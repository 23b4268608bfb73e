/**
 * IntegralTransformer - 적분 변환기 (i)
 *
 * x 로 정렬한 뒤 오른쪽 끝점 누적합을 계산합니다.
 *   I_0 = 0
 *   I_k = I_{k-1} + y_k * (x_k - x_{k-1})
 *
 * 결과에 윈도우 (0, 0) 미분을 적용하면 첫 점을 뺀 원래 y 가 그대로 나옵니다.
 */

import { XYTable } from '../../core/XYTable';
import type { Transformer } from './Transformer';
import { assertFinite, assertUniqueSortedX, sortedIndicesByX } from './Transformer';

export class IntegralTransformer implements Transformer {
  readonly name = 'Integral';
  readonly letter = 'i';

  transform(table: XYTable): XYTable {
    const sorted = table.pick(sortedIndicesByX(table, this.name));
    assertUniqueSortedX(sorted, this.name);

    const { xs, ys } = sorted;
    const sums = new Array<number>(xs.length);
    let acc = 0;
    for (let i = 0; i < xs.length; i++) {
      if (i > 0) {
        acc += ys[i] * (xs[i] - xs[i - 1]);
      }
      sums[i] = acc;
    }

    return assertFinite(
      XYTable.fromColumns(xs, sums, { x: sorted.names.x, y: `${sorted.names.y}:Integral` }),
      this.name
    );
  }
}
