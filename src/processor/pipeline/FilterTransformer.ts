/**
 * FilterTransformer - 유한값 필터 변환기 (f)
 *
 * y 가 Infinity 또는 NaN 인 행을 버립니다. 행 순서와 컬럼 이름은 그대로입니다.
 */

import type { XYTable } from '../../core/XYTable';
import type { IEngine } from '../engines/IEngine';
import { ArqueroEngine } from '../engines/ArqueroEngine';
import type { Transformer } from './Transformer';

// =============================================================================
// FilterTransformer 클래스
// =============================================================================

/**
 * 유한값 필터
 *
 * 행 선택은 엔진(기본: Arquero)에 맡깁니다.
 */
export class FilterTransformer implements Transformer {
  readonly name = 'FiniteFilter';
  readonly letter = 'f';

  private readonly engine: IEngine;

  constructor(engine: IEngine = new ArqueroEngine()) {
    this.engine = engine;
  }

  transform(table: XYTable): XYTable {
    return this.engine.filterFinite(table);
  }
}
