/**
 * SortTransformer - 정렬 변환기 (o)
 *
 * x 오름차순 안정 정렬입니다. 컬럼 이름은 그대로 유지합니다.
 * 실제 값은 건드리지 않고 정렬된 인덱스 순서로 행을 골라 새 테이블을 만듭니다.
 */

import type { XYTable } from '../../core/XYTable';
import type { Transformer } from './Transformer';
import { sortedIndicesByX } from './Transformer';

// =============================================================================
// SortTransformer 클래스
// =============================================================================

/**
 * 정렬 변환기
 *
 * 같은 x 를 가진 행들은 입력 순서를 유지하므로 두 번 적용해도 결과가 같습니다.
 */
export class SortTransformer implements Transformer {
  readonly name = 'Sort';
  readonly letter = 'o';

  // ==========================================================================
  // Transformer 구현
  // ==========================================================================

  /**
   * 정렬 변환 실행
   *
   * @param table - 입력 테이블
   * @returns x 기준으로 정렬된 새 테이블
   */
  transform(table: XYTable): XYTable {
    return table.pick(sortedIndicesByX(table, this.name));
  }
}
