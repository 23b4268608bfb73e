/**
 * DerivativeTransformer - 미분 변환기 (d)
 *
 * x 로 정렬한 뒤 기준점(anchor)에서 x 가 윈도우 폭(left + right) 이상 나아갈 때마다
 * 기울기 (y - y_anchor) / (x - x_anchor) 를 내보내고 그 점을 새 기준점으로 삼습니다.
 * 윈도우가 (0, 0) 이면 이웃한 두 점의 기울기가 됩니다.
 *
 * x 가 중복되면 DuplicateKeyError 로 파이프라인 전체를 멈춥니다.
 */

import type { XWindow } from '../../types';
import { XYTable } from '../../core/XYTable';
import { formatNumber } from '../parser/OperatorParser';
import type { Transformer } from './Transformer';
import { assertFinite, assertUniqueSortedX, sortedIndicesByX } from './Transformer';

export class DerivativeTransformer implements Transformer {
  readonly name = 'Derivation';
  readonly letter = 'd';

  /** 윈도우 설정 */
  private readonly window: XWindow;

  constructor(window: XWindow = { left: 0, right: 0 }) {
    this.window = window;
  }

  transform(table: XYTable): XYTable {
    const sorted = table.pick(sortedIndicesByX(table, this.name));
    assertUniqueSortedX(sorted, this.name);

    const names = { x: sorted.names.x, y: this.columnName(sorted.names.y) };
    if (sorted.rowCount === 0) {
      return XYTable.empty(names);
    }

    const span = this.window.left + this.window.right;
    const { xs, ys } = sorted;
    const outX: number[] = [];
    const outY: number[] = [];

    let anchorX = xs[0];
    let anchorY = ys[0];
    for (let i = 1; i < xs.length; i++) {
      const x = xs[i];
      if (anchorX + span > x) continue;

      outX.push(x);
      outY.push((ys[i] - anchorY) / (x - anchorX));
      anchorX = x;
      anchorY = ys[i];
    }

    return assertFinite(XYTable.fromColumns(outX, outY, names), this.name);
  }

  private columnName(yName: string): string {
    const { left, right } = this.window;
    if (left === 0 && right === 0) {
      return `${yName}:Derivation`;
    }
    return `${yName}:Derivation(${formatNumber(left)},${formatNumber(right)})`;
  }
}
