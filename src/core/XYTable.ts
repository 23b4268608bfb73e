/**
 * XYTable - 두 컬럼 테이블 (값 객체)
 *
 * 모든 변환 연산자는 XYTable 하나를 받아 새 XYTable 을 돌려줍니다.
 * 생성 시 배열을 복사하므로 호출자가 넘긴 배열을 나중에 바꿔도 테이블은 변하지 않습니다.
 */

import type { ColumnNames, XYRow } from '../types';

export class XYTable {
  /** x 값 (행 순서) */
  readonly xs: readonly number[];

  /** y 값 (행 순서) */
  readonly ys: readonly number[];

  /** 컬럼 이름 */
  readonly names: ColumnNames;

  // ==========================================================================
  // 생성자
  // ==========================================================================

  private constructor(xs: number[], ys: number[], names: ColumnNames) {
    this.xs = xs;
    this.ys = ys;
    this.names = names;
  }

  /**
   * 컬럼 배열로 생성
   *
   * @throws RangeError 두 컬럼 길이가 다를 때
   */
  static fromColumns(xs: ArrayLike<number>, ys: ArrayLike<number>, names: ColumnNames): XYTable {
    if (xs.length !== ys.length) {
      throw new RangeError(`column length mismatch: x has ${xs.length} rows, y has ${ys.length}`);
    }
    return new XYTable(Array.from(xs), Array.from(ys), { x: names.x, y: names.y });
  }

  /**
   * 행 목록으로 생성
   */
  static fromRows(rows: Iterable<XYRow>, names: ColumnNames): XYTable {
    const xs: number[] = [];
    const ys: number[] = [];
    for (const [x, y] of rows) {
      xs.push(x);
      ys.push(y);
    }
    return new XYTable(xs, ys, { x: names.x, y: names.y });
  }

  /**
   * 빈 테이블
   */
  static empty(names: ColumnNames): XYTable {
    return new XYTable([], [], { x: names.x, y: names.y });
  }

  // ==========================================================================
  // 조회
  // ==========================================================================

  get rowCount(): number {
    return this.xs.length;
  }

  /**
   * 행 목록 반환 (새 배열)
   */
  rows(): XYRow[] {
    return this.xs.map((x, i) => [x, this.ys[i]] as const);
  }

  /**
   * 인덱스 순서대로 행을 골라 새 테이블 생성
   */
  pick(indices: ArrayLike<number>, names: ColumnNames = this.names): XYTable {
    const xs = new Array<number>(indices.length);
    const ys = new Array<number>(indices.length);
    for (let i = 0; i < indices.length; i++) {
      const source = indices[i];
      xs[i] = this.xs[source];
      ys[i] = this.ys[source];
    }
    return new XYTable(xs, ys, { x: names.x, y: names.y });
  }

  /**
   * 컬럼 이름만 바꾼 새 테이블
   */
  withNames(names: ColumnNames): XYTable {
    return new XYTable(this.xs.slice(), this.ys.slice(), { x: names.x, y: names.y });
  }

  /**
   * 값과 이름이 모두 같은지 비교 (NaN 은 NaN 과 같다고 봅니다)
   */
  equals(other: XYTable): boolean {
    if (this.names.x !== other.names.x || this.names.y !== other.names.y) return false;
    if (this.rowCount !== other.rowCount) return false;
    for (let i = 0; i < this.rowCount; i++) {
      if (!Object.is(this.xs[i], other.xs[i]) && this.xs[i] !== other.xs[i]) return false;
      if (!Object.is(this.ys[i], other.ys[i]) && this.ys[i] !== other.ys[i]) return false;
    }
    return true;
  }
}
