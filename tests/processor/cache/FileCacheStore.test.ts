/**
 * FileCacheStore 테스트
 *
 * 임시 디렉터리에 실제 파일을 씁니다.
 */

import { copyFile, mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ExternalCollaboratorError, LineageMismatchError } from '../../../src/core/errors';
import { FileCacheStore } from '../../../src/processor/cache/FileCacheStore';
import { CacheResolver } from '../../../src/processor/cache/CacheResolver';
import { parseOperatorSequence } from '../../../src/processor/parser/OperatorParser';
import { makeTempDir, testLineage, xy } from '../../fixtures/tables';

const CLOCK = () => new Date('2024-01-01T00:00:00.000Z');

describe('FileCacheStore', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ path: dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('빈 디렉터리는 계보 없음, 엔트리 없음', async () => {
    const store = new FileCacheStore(join(dir, 'missing'));

    expect(await store.readLineage()).toBeNull();
    expect(await store.list()).toEqual([]);
  });

  it('첫 기록 때 lineage.json 과 cache/1.seqc 생성', async () => {
    const store = new FileCacheStore(dir, { clock: CLOCK });
    const lineage = testLineage();

    const meta = await store.write('i', xy([1, 2], [3, 4]), lineage);

    expect(meta).toEqual({
      key: 'i',
      sequence: 1,
      writtenAt: '2024-01-01T00:00:00.000Z',
      lineageId: lineage.id,
      names: { x: 'x', y: 'y' },
      rowCount: 2,
    });
    expect(await readdir(join(dir, 'cache'))).toEqual(['1.seqc']);
    expect(await store.readLineage()).toEqual(lineage);

    const content = await readFile(store.entryPath(1), 'utf8');
    expect(content.endsWith('---- end of metadata ----\nx,y\n1,2\n3,4\n')).toBe(true);
  });

  it('다른 인스턴스에서도 읽을 수 있음', async () => {
    await new FileCacheStore(dir).write('o', xy([2, 20], [1, 10]), testLineage());

    const reopened = new FileCacheStore(dir);
    const [entry] = await reopened.list();
    const table = await reopened.load(entry);

    expect(entry.key).toBe('o');
    expect(table.rows()).toEqual([[2, 20], [1, 10]]);
  });

  it('순번은 기록마다 증가', async () => {
    const store = new FileCacheStore(dir);
    await store.write('i', xy([1, 1]), testLineage());
    await store.write('i', xy([1, 2]), testLineage());
    await store.write('id', xy([1, 3]), testLineage());

    const entries = await store.list();
    expect(entries.map(e => [e.key, e.sequence])).toEqual([['i', 1], ['i', 2], ['id', 3]]);
    expect((await store.load(entries[1])).ys).toEqual([2]);
  });

  it('동시에 기록해도 순번이 겹치지 않음', async () => {
    const store = new FileCacheStore(dir);
    const written = await Promise.all([
      store.write('i', xy([1, 1]), testLineage()),
      store.write('s', xy([1, 2]), testLineage()),
      store.write('o', xy([1, 3]), testLineage()),
    ]);

    expect(written.map(meta => meta.sequence)).toEqual([1, 2, 3]);
    expect((await readdir(store.cacheDir)).sort()).toEqual(['1.seqc', '2.seqc', '3.seqc']);
    expect((await readdir(dir)).sort()).toEqual(['cache', 'lineage.json']);
  });

  it('실패한 기록 뒤에도 다음 기록은 진행', async () => {
    const store = new FileCacheStore(dir);
    const results = await Promise.allSettled([
      store.write('i', xy([1, 1]), testLineage('/data/a.csv')),
      store.write('i', xy([1, 1]), testLineage('/data/b.csv')),
      store.write('s', xy([1, 1]), testLineage('/data/a.csv')),
    ]);

    expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    expect((await store.list()).map(e => [e.key, e.sequence])).toEqual([['i', 1], ['s', 2]]);
  });

  it('목록은 메타데이터만 읽음', async () => {
    const store = new FileCacheStore(dir);
    await store.write('i', xy([1, 1]), testLineage());
    const content = await readFile(store.entryPath(1), 'utf8');
    const head = content.slice(0, content.indexOf('---- end of metadata ----\n') + '---- end of metadata ----\n'.length);
    await writeFile(store.entryPath(1), `${head}${'not,a,table\n'.repeat(2000)}`, 'utf8');

    const [entry] = await store.list();
    expect(entry.key).toBe('i');
    await expect(store.load(entry)).rejects.toBeInstanceOf(ExternalCollaboratorError);
  });

  it('다른 계보로 기록하면 LineageMismatchError', async () => {
    const store = new FileCacheStore(dir);
    await store.write('i', xy([1, 1]), testLineage('/data/a.csv'));

    await expect(store.write('i', xy([1, 1]), testLineage('/data/b.csv'))).rejects.toBeInstanceOf(
      LineageMismatchError
    );
  });

  it('lineage.json 이 없어도 엔트리 계보가 다르면 해석 실패', async () => {
    const store = new FileCacheStore(dir);
    await store.write('i', xy([1, 1]), testLineage('/data/a.csv'));
    await rm(store.lineagePath);

    await expect(
      new CacheResolver(store).resolve(parseOperatorSequence('i'), testLineage('/data/b.csv'))
    ).rejects.toBeInstanceOf(LineageMismatchError);
  });

  it('규칙에 맞지 않는 파일 이름은 무시', async () => {
    const store = new FileCacheStore(dir);
    await store.write('i', xy([1, 1]), testLineage());
    await writeFile(join(store.cacheDir, 'notes.txt'), 'hello', 'utf8');

    expect((await store.list()).map(e => e.key)).toEqual(['i']);
  });

  // ===========================================================================
  // 손상된 저장소
  // ===========================================================================

  describe('손상된 저장소', () => {
    it('깨진 엔트리 파일', async () => {
      const store = new FileCacheStore(dir);
      await mkdir(store.cacheDir, { recursive: true });
      await writeFile(store.entryPath(1), 'garbage', 'utf8');

      await expect(store.list()).rejects.toBeInstanceOf(ExternalCollaboratorError);
    });

    it('파일 이름과 순번 불일치', async () => {
      const store = new FileCacheStore(dir);
      await store.write('i', xy([1, 1]), testLineage());
      await copyFile(store.entryPath(1), store.entryPath(5));

      await expect(store.list()).rejects.toThrow('file name does not match sequence 1');
    });

    it('없는 엔트리 불러오기', async () => {
      const store = new FileCacheStore(dir);
      const meta = await store.write('i', xy([1, 1]), testLineage());
      await rm(store.entryPath(1));

      await expect(store.load(meta)).rejects.toBeInstanceOf(ExternalCollaboratorError);
    });

    it('깨진 lineage.json', async () => {
      const store = new FileCacheStore(dir);
      await writeFile(store.lineagePath, 'not json', 'utf8');

      await expect(store.readLineage()).rejects.toThrow('is not valid JSON');
    });
  });
});
