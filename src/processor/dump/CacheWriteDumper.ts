/**
 * CacheWriteDumper - 캐시 기록 덤프 (C)
 *
 * 현재 테이블을 덤프를 뺀 누적 프리픽스 키로 저장소에 기록합니다.
 * 다시 열 수 있는 원본(계보)이 없으면 기록을 거부합니다.
 */

import { CacheWriteRefusedError } from '../../core/errors';
import { createLogger } from '../../core/logger';
import type { CacheStore } from '../cache/CacheStore';
import type { DumpContext, Dumper } from '../pipeline/Transformer';

const log = createLogger('CacheWriteDumper');

export class CacheWriteDumper implements Dumper {
  readonly name = 'CacheWrite';
  readonly letter = 'C';

  private readonly store: CacheStore;

  constructor(store: CacheStore) {
    this.store = store;
  }

  async dump(ctx: DumpContext): Promise<void> {
    if (ctx.lineage === null) {
      throw new CacheWriteRefusedError('the input has no lineage (stdin or in-memory table)');
    }
    if (ctx.key === '') {
      log.warn('no transform ran before the cache write, nothing to store');
      return;
    }

    await this.store.write(ctx.key, ctx.table, ctx.lineage);
  }
}
