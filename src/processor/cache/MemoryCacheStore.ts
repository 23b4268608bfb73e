/**
 * MemoryCacheStore - 프로세스 내 캐시 저장소
 *
 * 라이브러리 호출자와 테스트용입니다. 테이블은 값 객체라 복사 없이 보관합니다.
 */

import type { CacheEntryMeta, LineageRef } from '../../types';
import type { XYTable } from '../../core/XYTable';
import type { CacheStore } from './CacheStore';
import { assertSameLineage, nextSequence } from './CacheStore';

interface StoredEntry {
  meta: CacheEntryMeta;
  table: XYTable;
}

export class MemoryCacheStore implements CacheStore {
  private lineage: LineageRef | null = null;

  private readonly entries: StoredEntry[] = [];

  private readonly clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  async readLineage(): Promise<LineageRef | null> {
    return this.lineage;
  }

  async list(): Promise<CacheEntryMeta[]> {
    return this.entries.map(e => e.meta);
  }

  async load(entry: CacheEntryMeta): Promise<XYTable> {
    const stored = this.entries.find(e => e.meta.sequence === entry.sequence);
    if (!stored) {
      throw new RangeError(`no cache entry with sequence ${entry.sequence}`);
    }
    return stored.table;
  }

  async write(key: string, table: XYTable, lineage: LineageRef): Promise<CacheEntryMeta> {
    assertSameLineage(this.lineage, lineage);
    this.lineage = lineage;

    const meta: CacheEntryMeta = {
      key,
      sequence: nextSequence(this.entries.map(e => e.meta)),
      writtenAt: this.clock().toISOString(),
      lineageId: lineage.id,
      names: table.names,
      rowCount: table.rowCount,
    };
    this.entries.push({ meta, table });
    return meta;
  }
}
