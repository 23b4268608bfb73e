/**
 * SourceReader 테스트
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SourceError } from '../../src/core/errors';
import { createLineage } from '../../src/processor/cache/lineage';
import { SourceReader, parseSelector, type SourceRequest } from '../../src/source/SourceReader';
import { makeTempDir } from '../fixtures/tables';

function request(overrides: Partial<SourceRequest> = {}): SourceRequest {
  return { input: '-', hasHeader: false, x: '$1', y: '$2', ...overrides };
}

describe('parseSelector', () => {
  it('컬럼 번호', () => {
    expect(parseSelector('$2')).toEqual({ kind: 'index', index: 2 });
    expect(() => parseSelector('$0')).toThrow("column index in '$0' starts at 1");
  });

  it('헤더 이름', () => {
    expect(parseSelector('$price')).toEqual({ kind: 'name', name: 'price' });
    expect(parseSelector('${unit price}')).toEqual({ kind: 'name', name: 'unit price' });
  });

  it('상수', () => {
    expect(parseSelector('1.5')).toEqual({ kind: 'constant', value: 1.5 });
    expect(parseSelector('-2')).toEqual({ kind: 'constant', value: -2 });
  });

  it('잘못된 선택자', () => {
    expect(() => parseSelector('abc')).toThrow(SourceError);
    expect(() => parseSelector('abc')).toThrow("invalid column selector 'abc'");
    expect(() => parseSelector('inf')).toThrow("invalid column selector 'inf'");
  });
});

describe('SourceReader', () => {
  const reader = new SourceReader({ cwd: '/work' });

  // ===========================================================================
  // 해석
  // ===========================================================================

  describe('parse', () => {
    it('헤더 없으면 선택자가 컬럼 이름', () => {
      const table = reader.parse('1,10\n2,20\n', request());

      expect(table.rows()).toEqual([[1, 10], [2, 20]]);
      expect(table.names).toEqual({ x: '$1', y: '$2' });
    });

    it('헤더가 있으면 헤더 이름 사용', () => {
      const table = reader.parse('time,value\n1,10\n2,20\n', request({ hasHeader: true, x: '$time', y: '$2' }));

      expect(table.rows()).toEqual([[1, 10], [2, 20]]);
      expect(table.names).toEqual({ x: 'time', y: 'value' });
    });

    it('상수 선택자는 모든 행에 같은 값', () => {
      const table = reader.parse('5\n6\n', request({ x: '0', y: '$1' }));

      expect(table.rows()).toEqual([[0, 5], [0, 6]]);
      expect(table.names).toEqual({ x: '0', y: '$1' });
    });

    it('nan, inf 셀', () => {
      const table = reader.parse('1,nan\n2,inf\n', request());

      expect(table.ys[0]).toBeNaN();
      expect(table.ys[1]).toBe(Infinity);
    });

    it('숫자가 아닌 셀', () => {
      expect(() => reader.parse('1,2\n3,abc\n', request())).toThrow("row 2, column 2: 'abc' is not a number");
    });

    it('헤더 없이 이름으로 선택', () => {
      expect(() => reader.parse('1,2\n', request({ y: '$v' }))).toThrow(
        "'$v' selects by name but the input has no header row"
      );
    });

    it('없는 헤더 이름', () => {
      expect(() => reader.parse('a,b\n1,2\n', request({ hasHeader: true, y: '$nope' }))).toThrow(
        "no column named 'nope'"
      );
    });

    it('컬럼 수를 넘는 번호', () => {
      expect(() => reader.parse('1,2\n', request({ y: '$5' }))).toThrow("'$5' selects column 5, input has 2");
    });
  });

  // ===========================================================================
  // 계보 / 읽기
  // ===========================================================================

  describe('계보', () => {
    it('stdin 은 계보 없음', () => {
      expect(reader.lineageFor(request())).toBeNull();
    });

    it('파일은 절대 경로로 계보 생성', () => {
      const lineage = reader.lineageFor(request({ input: 'data.csv', hasHeader: true }));

      expect(lineage).toEqual(createLineage({ source: '/work/data.csv', hasHeader: true, x: '$1', y: '$2' }));
    });
  });

  describe('read', () => {
    let dir: string;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
      ({ path: dir, cleanup } = await makeTempDir());
    });

    afterEach(async () => {
      await cleanup();
    });

    it('stdin 읽기', async () => {
      const stdinReader = new SourceReader({ readStdin: async () => '3,4\n' });
      expect((await stdinReader.read(request())).rows()).toEqual([[3, 4]]);
    });

    it('cwd 기준 상대 경로', async () => {
      await writeFile(join(dir, 'data.csv'), '1,2\n', 'utf8');
      const fileReader = new SourceReader({ cwd: dir });

      expect((await fileReader.read(request({ input: 'data.csv' }))).rows()).toEqual([[1, 2]]);
    });

    it('없는 파일은 SourceError', async () => {
      const fileReader = new SourceReader({ cwd: dir });

      await expect(fileReader.read(request({ input: 'missing.csv' }))).rejects.toThrow(
        `cannot read ${join(dir, 'missing.csv')}`
      );
    });
  });
});
