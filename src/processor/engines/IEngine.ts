/**
 * IEngine - 테이블 엔진 추상화 인터페이스
 *
 * 관계형 연산(필터, 중복 제거)과 CSV 입출력을 맡는 계층입니다.
 * 수치 연산자(미분, 적분, ...)는 XYTable 배열을 직접 다루고,
 * 행 단위 선택이나 텍스트 인코딩처럼 테이블 라이브러리가 잘하는 일만 엔진에 맡깁니다.
 */

import type { XYTable } from '../../core/XYTable';

// ============================================================================
// 원시 시트
// ============================================================================

/**
 * CSV 를 읽은 직후의 시트 (문자열 셀)
 */
export interface RawSheet {
  /** 헤더 행 이름 (헤더가 없으면 null) */
  readonly header: readonly string[] | null;

  /** 컬럼별 셀 값 (헤더 행 제외) */
  readonly columns: readonly (readonly string[])[];

  /** 데이터 행 수 */
  readonly rowCount: number;
}

// ============================================================================
// 엔진 인터페이스
// ============================================================================

/**
 * 엔진 인터페이스
 *
 * 모든 메서드는 입력 테이블을 바꾸지 않고 새 결과를 돌려줍니다.
 */
export interface IEngine {
  /**
   * y 가 유한한 행만 남김 (순서 유지)
   */
  filterFinite(table: XYTable): XYTable;

  /**
   * x 별 첫 행만 남김 (순서 유지)
   */
  uniqueByX(table: XYTable): XYTable;

  /**
   * 쉼표 구분 텍스트 파싱
   *
   * @param hasHeader - true 면 첫 행을 헤더로 사용
   */
  parseSheet(text: string, hasHeader: boolean): RawSheet;

  /**
   * 테이블을 CSV 텍스트로 변환
   *
   * @param header - true 면 컬럼 이름 행을 먼저 씀
   */
  formatTable(table: XYTable, header: boolean): string;
}
