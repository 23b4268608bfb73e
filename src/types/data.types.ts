/**
 * 데이터 타입 정의
 *
 * 파이프라인에서 다루는 기본 데이터 구조를 정의합니다.
 * 이 타입들은 모든 모듈에서 공통으로 사용됩니다.
 */

// ============================================================================
// 행(Row) 타입
// ============================================================================

/**
 * 한 줄의 데이터 (x, y 쌍)
 *
 * 모든 값은 IEEE-754 배정밀도 실수입니다.
 *
 * @example
 * const row: XYRow = [1, 2.5];
 */
export type XYRow = readonly [x: number, y: number];

// ============================================================================
// 컬럼 이름
// ============================================================================

/**
 * 테이블의 컬럼 이름 쌍
 *
 * 컬럼 이름은 개별 행이 아니라 테이블에 속합니다.
 */
export interface ColumnNames {
  /** x 컬럼 이름 */
  readonly x: string;

  /** y 컬럼 이름 */
  readonly y: string;
}

// ============================================================================
// 컬럼 선택자
// ============================================================================

/**
 * 원본 스프레드시트에서 축 값을 가져오는 방법
 *
 * - index: 1부터 시작하는 컬럼 번호 (`$3`)
 * - name: 헤더에 적힌 컬럼 이름 (`$price`, `${unit price}`)
 * - constant: 모든 행에 같은 숫자 (`1`)
 */
export type ColumnSelector =
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'name'; readonly name: string }
  | { readonly kind: 'constant'; readonly value: number };
