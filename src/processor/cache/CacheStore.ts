/**
 * CacheStore - 캐시 저장소 인터페이스
 *
 * 엔트리는 한 번 쓰이면 바뀌지 않습니다. 같은 키를 다시 쓰면 더 큰 순번의
 * 새 엔트리가 생기고, 이전 엔트리는 남아 있지만 해석에서 밀려납니다.
 *
 * 저장소에는 계보가 하나뿐입니다. 첫 기록 때 정해지고, 다른 계보로 기록하려 하면
 * LineageMismatchError 가 납니다.
 */

import type { CacheEntryMeta, LineageRef } from '../../types';
import type { XYTable } from '../../core/XYTable';
import { LineageMismatchError } from '../../core/errors';

export interface CacheStore {
  /**
   * 저장소 계보 (아직 기록이 없으면 null)
   */
  readLineage(): Promise<LineageRef | null>;

  /**
   * 모든 엔트리 메타데이터 (순번 오름차순)
   */
  list(): Promise<CacheEntryMeta[]>;

  /**
   * 엔트리의 테이블 불러오기
   */
  load(entry: CacheEntryMeta): Promise<XYTable>;

  /**
   * 새 엔트리 기록
   *
   * @throws LineageMismatchError 저장소 계보와 다를 때
   */
  write(key: string, table: XYTable, lineage: LineageRef): Promise<CacheEntryMeta>;
}

/**
 * 기록 전 계보 검사
 */
export function assertSameLineage(stored: LineageRef | null, lineage: LineageRef): void {
  if (stored !== null && stored.id !== lineage.id) {
    throw new LineageMismatchError(lineage.id, stored.id);
  }
}

/**
 * 다음 기록 순번
 */
export function nextSequence(entries: readonly CacheEntryMeta[]): number {
  return entries.reduce((max, entry) => Math.max(max, entry.sequence), 0) + 1;
}
