/**
 * AverageTransformer - 이동 평균 변환기 (a)
 *
 * 각 행 i 마다 x_j 가 [x_i - left, x_i + right] 안에 있는 모든 y_j 의 평균을 냅니다.
 * 출력 행 수와 순서는 입력과 같습니다 (표본 추출 없음).
 *
 * 구현:
 * 1. x 기준 정렬 인덱스를 만든다
 * 2. 행마다 이진 탐색으로 구간 [lo, hi) 를 찾는다
 * 3. 구간 안의 y 를 보정 합산(Neumaier)으로 더해 개수로 나눈다
 *
 * 누적합의 차를 쓰지 않으므로 큰 값 옆의 작은 값이 상쇄로 사라지지 않습니다.
 * 합이 넘치면 각 항을 먼저 나눠 다시 더합니다.
 */

import type { XWindow } from '../../types';
import { XYTable } from '../../core/XYTable';
import type { Transformer } from './Transformer';
import { assertFinite, sortedIndicesByX } from './Transformer';

export class AverageTransformer implements Transformer {
  readonly name = 'Average';
  readonly letter = 'a';

  private readonly window: XWindow;

  constructor(window: XWindow = { left: 0, right: 0 }) {
    this.window = window;
  }

  transform(table: XYTable): XYTable {
    const order = sortedIndicesByX(table, this.name);
    const sortedY = order.map(i => table.ys[i]);
    const sortedX = order.map(i => table.xs[i]);

    const averages = table.xs.map(x => {
      const lo = lowerBound(sortedX, x - this.window.left);
      const hi = upperBound(sortedX, x + this.window.right);
      return windowMean(sortedY, lo, hi);
    });

    return assertFinite(
      XYTable.fromColumns(table.xs, averages, { x: table.names.x, y: `${table.names.y}:Average` }),
      this.name
    );
  }
}

/**
 * values[lo..hi) 의 평균
 */
export function windowMean(values: readonly number[], lo: number, hi: number): number {
  const count = hi - lo;
  const total = compensatedSum(values, lo, hi, 1);
  if (Number.isFinite(total)) {
    return total / count;
  }
  return compensatedSum(values, lo, hi, count);
}

function compensatedSum(values: readonly number[], lo: number, hi: number, divisor: number): number {
  let sum = 0;
  let compensation = 0;
  for (let k = lo; k < hi; k++) {
    const term = values[k] / divisor;
    const next = sum + term;
    compensation += Math.abs(sum) >= Math.abs(term) ? sum - next + term : term - next + sum;
    sum = next;
  }
  return sum + compensation;
}

// =============================================================================
// 이진 탐색
// =============================================================================

/** value 이상인 첫 위치 */
function lowerBound(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** value 초과인 첫 위치 */
function upperBound(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
