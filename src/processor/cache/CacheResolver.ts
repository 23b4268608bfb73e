/**
 * CacheResolver - 캐시 재사용 지점 결정
 *
 * 요청 시퀀스 R 에 대해:
 * 1. 덤프를 뺀 변환 토큰 목록 R' 를 만든다
 * 2. R' 의 가장 긴 프리픽스를 키로 가진 엔트리를 고른다 (동률이면 최신 기록)
 * 3. 원래 R 에서 키의 마지막 변환 토큰 위치까지 건너뛴다
 *
 * 그 사이의 덤프도 함께 건너뛰지만, 마지막으로 일치한 변환 뒤의 덤프는 다시 실행됩니다.
 */

import type { CacheEntryMeta, CacheResolution, LineageRef, Operator } from '../../types';
import { LineageMismatchError } from '../../core/errors';
import { createLogger } from '../../core/logger';
import { isTransform, transformTokens } from '../parser/OperatorParser';
import type { CacheStore } from './CacheStore';
import { CacheIndex } from './CacheIndex';

const log = createLogger('CacheResolver');

export class CacheResolver {
  private readonly store: CacheStore;

  constructor(store: CacheStore) {
    this.store = store;
  }

  /**
   * 재사용할 엔트리와 건너뛸 연산자 수
   *
   * @returns 일치하는 엔트리가 없으면 null
   * @throws LineageMismatchError 저장소나 엔트리의 계보가 실행 계보와 다를 때
   */
  async resolve(operators: readonly Operator[], lineage: LineageRef): Promise<CacheResolution | null> {
    const stored = await this.store.readLineage();
    if (stored !== null && stored.id !== lineage.id) {
      throw new LineageMismatchError(lineage.id, stored.id);
    }

    const entries = await this.store.list();
    assertEntryLineage(entries, lineage);

    const match = CacheIndex.build(entries).longestPrefix(transformTokens(operators));
    if (match === null) {
      log.debug('no reusable prefix');
      return null;
    }

    const skip = skipCount(operators, match.length);
    log.info(`reusing '${match.entry.key}' (entry ${match.entry.sequence}), skipping ${skip} operator(s)`);
    return { entry: match.entry, skip };
  }
}

function assertEntryLineage(entries: readonly CacheEntryMeta[], lineage: LineageRef): void {
  const foreign = entries.find(e => e.lineageId !== lineage.id);
  if (foreign) {
    throw new LineageMismatchError(lineage.id, foreign.lineageId);
  }
}

/**
 * matched 번째 변환 토큰의 위치 + 1 (matched 가 0 이면 0)
 *
 * @example
 * // 'iCd1000CcC', matched = 2 (id1000) → 3 (i, C, d1000 을 건너뛰고 뒤의 C 부터 실행)
 */
export function skipCount(operators: readonly Operator[], matched: number): number {
  if (matched <= 0) return 0;

  let transforms = 0;
  for (let i = 0; i < operators.length; i++) {
    if (isTransform(operators[i])) {
      transforms++;
      if (transforms === matched) return i + 1;
    }
  }
  return operators.length;
}
