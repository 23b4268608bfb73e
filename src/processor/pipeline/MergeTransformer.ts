/**
 * MergeTransformer - 병합 변환기 (m)
 *
 * 정렬하지 않습니다. 바로 이어지는 같은 x 의 행들(streak)만 y 를 합칩니다.
 * 나중에 같은 x 가 다시 나오면 새 streak 으로 시작합니다.
 *
 * @example
 * // [(1,2), (1,3), (2,4), (1,2)]
 * // → [(1,5), (2,4), (1,2)]
 */

import { XYTable } from '../../core/XYTable';
import type { Transformer } from './Transformer';
import { assertFinite } from './Transformer';

export class MergeTransformer implements Transformer {
  readonly name = 'Merge';
  readonly letter = 'm';

  transform(table: XYTable): XYTable {
    const { xs, ys } = table;
    const outX: number[] = [];
    const outY: number[] = [];

    for (let i = 0; i < xs.length; i++) {
      const last = outX.length - 1;
      if (last >= 0 && outX[last] === xs[i]) {
        outY[last] += ys[i];
      } else {
        outX.push(xs[i]);
        outY.push(ys[i]);
      }
    }

    return assertFinite(
      XYTable.fromColumns(outX, outY, { x: table.names.x, y: `${table.names.y}:Merge` }),
      this.name
    );
  }
}
