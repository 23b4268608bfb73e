/**
 * CacheIndex / CacheResolver 테스트
 */

import { describe, it, expect } from 'vitest';
import type { CacheEntryMeta } from '../../../src/types';
import { LineageMismatchError } from '../../../src/core/errors';
import { CacheIndex } from '../../../src/processor/cache/CacheIndex';
import { CacheResolver, skipCount } from '../../../src/processor/cache/CacheResolver';
import { MemoryCacheStore } from '../../../src/processor/cache/MemoryCacheStore';
import { parseOperatorSequence } from '../../../src/processor/parser/OperatorParser';
import { testLineage, xy } from '../../fixtures/tables';

function meta(key: string, sequence: number, lineageId = 'lineage'): CacheEntryMeta {
  return {
    key,
    sequence,
    writtenAt: '2024-01-01T00:00:00.000Z',
    lineageId,
    names: { x: 'x', y: 'y' },
    rowCount: 0,
  };
}

describe('CacheIndex', () => {
  it('가장 긴 프리픽스 선택', () => {
    const index = CacheIndex.build([meta('i', 1), meta('id1000', 2), meta('id1000c', 3)]);
    const match = index.longestPrefix(['i', 'd1000', 's']);

    expect(match?.entry.sequence).toBe(2);
    expect(match?.length).toBe(2);
    expect(index.size).toBe(3);
  });

  it('연산자 경계에서만 일치', () => {
    const index = CacheIndex.build([meta('id1', 1)]);

    expect(index.longestPrefix(['i', 'd10'])).toBeNull();
    expect(index.longestPrefix(['i', 'd1', 'o'])?.length).toBe(2);
  });

  it('같은 키는 순번이 가장 큰 엔트리', () => {
    const index = CacheIndex.build([meta('o', 1), meta('o', 3), meta('o', 2)]);

    expect(index.size).toBe(1);
    expect(index.longestPrefix(['o'])?.entry.sequence).toBe(3);
  });

  it('빈 키는 어떤 요청과도 일치하지 않음', () => {
    const index = CacheIndex.build([meta('', 1)]);

    expect(index.size).toBe(0);
    expect(index.longestPrefix(['i'])).toBeNull();
    expect(index.longestPrefix([])).toBeNull();
  });

  it('긴 키만 있으면 짧은 요청과 일치하지 않음', () => {
    const index = CacheIndex.build([meta('ids', 1)]);
    expect(index.longestPrefix(['i', 'd'])).toBeNull();
  });
});

describe('skipCount', () => {
  const ops = parseOperatorSequence('iCd1000CcC');

  it('마지막으로 일치한 변환 바로 뒤에서 멈춤', () => {
    expect(skipCount(ops, 1)).toBe(1);
    expect(skipCount(ops, 2)).toBe(3);
    expect(skipCount(ops, 3)).toBe(5);
  });

  it('일치 전의 덤프는 함께 건너뜀', () => {
    expect(skipCount(parseOperatorSequence('OiO'), 1)).toBe(2);
    expect(skipCount(parseOperatorSequence('OiO'), 0)).toBe(0);
  });

  it('덤프가 없으면 변환 수와 같음', () => {
    expect(skipCount(parseOperatorSequence('ids'), 2)).toBe(2);
  });
});

describe('CacheResolver', () => {
  it('일치가 없으면 null', async () => {
    const store = new MemoryCacheStore();
    await store.write('o', xy([1, 1]), testLineage());

    const resolution = await new CacheResolver(store).resolve(parseOperatorSequence('is'), testLineage());
    expect(resolution).toBeNull();
  });

  it('엔트리와 건너뛸 수', async () => {
    const store = new MemoryCacheStore();
    await store.write('i', xy([1, 1]), testLineage());
    await store.write('is', xy([1, 1]), testLineage());

    const resolution = await new CacheResolver(store).resolve(parseOperatorSequence('iOsOd'), testLineage());
    expect(resolution?.entry.key).toBe('is');
    expect(resolution?.skip).toBe(3);
  });

  it('저장소 계보와 다르면 LineageMismatchError', async () => {
    const store = new MemoryCacheStore();
    await store.write('i', xy([1, 1]), testLineage('/data/a.csv'));

    await expect(
      new CacheResolver(store).resolve(parseOperatorSequence('i'), testLineage('/data/b.csv'))
    ).rejects.toBeInstanceOf(LineageMismatchError);
  });
});
