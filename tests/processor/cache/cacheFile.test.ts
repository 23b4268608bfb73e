/**
 * 캐시 파일 코덱 테스트
 */

import { describe, it, expect } from 'vitest';
import type { CacheEntryMeta } from '../../../src/types';
import { XYTable } from '../../../src/core/XYTable';
import { ExternalCollaboratorError } from '../../../src/core/errors';
import {
  METADATA_SEPARATOR,
  decodeCacheFile,
  decodeCacheMeta,
  encodeCacheFile,
} from '../../../src/processor/cache/cacheFile';
import { ArqueroEngine } from '../../../src/processor/engines/ArqueroEngine';

const engine = new ArqueroEngine();

const META: CacheEntryMeta = {
  key: 'id',
  sequence: 1,
  writtenAt: '2024-01-01T00:00:00.000Z',
  lineageId: 'test-lineage',
  names: { x: 't', y: 'v:Integral' },
  rowCount: 2,
};

const TABLE = XYTable.fromRows([[1, 2.5], [2, -0]], META.names);

const ENCODED = `${JSON.stringify(META, null, 2)}\n${METADATA_SEPARATOR}\nt,v:Integral\n1,2.5\n2,0\n`;

describe('cacheFile', () => {
  it('메타데이터, 구분선, 헤더 있는 CSV 순서로 인코딩', () => {
    expect(encodeCacheFile(META, TABLE, engine)).toBe(ENCODED);
  });

  it('디코딩', () => {
    const { meta, table } = decodeCacheFile(ENCODED, engine, '1.seqc');

    expect(meta).toEqual(META);
    expect(table.rows()).toEqual([[1, 2.5], [2, 0]]);
    expect(table.names).toEqual({ x: 't', y: 'v:Integral' });
  });

  it('메타데이터만 읽기', () => {
    expect(decodeCacheMeta(ENCODED, '1.seqc')).toEqual(META);
  });

  it('컬럼 이름은 메타데이터 기준', () => {
    const meta = { ...META, names: { x: 'a,b', y: 'a,b' } };
    const text = encodeCacheFile(meta, TABLE.withNames(meta.names), engine);

    expect(text.endsWith(`${METADATA_SEPARATOR}\n"a,b","a,b"\n1,2.5\n2,0\n`)).toBe(true);
    expect(decodeCacheFile(text, engine, '1.seqc').table.names).toEqual({ x: 'a,b', y: 'a,b' });
  });

  it('빈 테이블', () => {
    const meta = { ...META, rowCount: 0 };
    const text = encodeCacheFile(meta, XYTable.empty(META.names), engine);

    expect(decodeCacheFile(text, engine, '1.seqc').table.rowCount).toBe(0);
  });

  it('유한하지 않은 값 보존', () => {
    const table = XYTable.fromRows([[1, NaN], [2, Infinity]], META.names);
    const text = encodeCacheFile(META, table, engine);

    const decoded = decodeCacheFile(text, engine, '1.seqc').table;
    expect(decoded.ys[0]).toBeNaN();
    expect(decoded.ys[1]).toBe(Infinity);
  });

  // ===========================================================================
  // 손상된 파일
  // ===========================================================================

  describe('손상된 파일', () => {
    it('구분선 없음', () => {
      expect(() => decodeCacheFile('{}', engine, '1.seqc')).toThrow(ExternalCollaboratorError);
      expect(() => decodeCacheFile('{}', engine, '1.seqc')).toThrow(
        'cache store: 1.seqc: metadata separator not found'
      );
    });

    it('메타데이터 JSON 오류', () => {
      expect(() => decodeCacheMeta(`{\n${METADATA_SEPARATOR}\n`, '1.seqc')).toThrow(
        'cache store: 1.seqc: metadata is not valid JSON'
      );
    });

    it('메타데이터 필드 누락', () => {
      expect(() => decodeCacheMeta(`{"key":"i"}\n${METADATA_SEPARATOR}\n`, '1.seqc')).toThrow(
        'cache store: 1.seqc: metadata fields are missing'
      );
    });

    it('행 수 불일치', () => {
      const text = ENCODED.replace('"rowCount": 2', '"rowCount": 3');
      expect(() => decodeCacheFile(text, engine, '1.seqc')).toThrow('expected 3 rows, found 2');
    });

    it('숫자가 아닌 셀', () => {
      const text = ENCODED.replace('2.5', 'abc');
      expect(() => decodeCacheFile(text, engine, '1.seqc')).toThrow("row 1 holds 'abc', not a number");
    });
  });
});
