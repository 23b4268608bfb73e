/**
 * FileCacheStore - 디렉터리 기반 캐시 저장소
 *
 * 디렉터리 구조:
 *   <outdir>/lineage.json
 *   <outdir>/cache/<sequence>.seqc
 *
 * 파일은 임시 이름으로 쓴 뒤 rename 하므로 읽는 쪽은 반쯤 쓰인 파일을 보지 않습니다.
 * 한 인스턴스의 기록은 호출 순서대로 하나씩 진행됩니다. 같은 디렉터리를 여러 곳에서
 * 쓸 때는 인스턴스 하나를 공유해야 순번이 겹치지 않습니다.
 */

import { type FileHandle, mkdir, open, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CacheEntryMeta, LineageRef } from '../../types';
import type { XYTable } from '../../core/XYTable';
import { ExternalCollaboratorError } from '../../core/errors';
import { createLogger } from '../../core/logger';
import type { IEngine } from '../engines/IEngine';
import { ArqueroEngine } from '../engines/ArqueroEngine';
import type { CacheStore } from './CacheStore';
import { assertSameLineage, nextSequence } from './CacheStore';
import { METADATA_SEPARATOR, decodeCacheFile, decodeCacheMeta, encodeCacheFile } from './cacheFile';
import { formatLineage, parseLineage } from './lineage';

const log = createLogger('FileCacheStore');

export const LINEAGE_FILE = 'lineage.json';
export const CACHE_DIR = 'cache';
const ENTRY_FILE_PATTERN = /^(\d+)\.seqc$/;
const HEAD_CHUNK_SIZE = 4096;

export interface FileCacheStoreOptions {
  engine?: IEngine;
  clock?: () => Date;
}

export class FileCacheStore implements CacheStore {
  readonly outdir: string;

  private readonly engine: IEngine;

  private readonly clock: () => Date;

  /** 마지막으로 예약된 기록 */
  private writeChain: Promise<unknown> = Promise.resolve();

  private tempCounter = 0;

  constructor(outdir: string, options: FileCacheStoreOptions = {}) {
    this.outdir = outdir;
    this.engine = options.engine ?? new ArqueroEngine();
    this.clock = options.clock ?? (() => new Date());
  }

  // ==========================================================================
  // 경로
  // ==========================================================================

  get lineagePath(): string {
    return join(this.outdir, LINEAGE_FILE);
  }

  get cacheDir(): string {
    return join(this.outdir, CACHE_DIR);
  }

  entryPath(sequence: number): string {
    return join(this.cacheDir, `${sequence}.seqc`);
  }

  // ==========================================================================
  // CacheStore 구현
  // ==========================================================================

  async readLineage(): Promise<LineageRef | null> {
    const text = await readOptional(this.lineagePath);
    return text === null ? null : parseLineage(text, this.lineagePath);
  }

  async list(): Promise<CacheEntryMeta[]> {
    let names: string[];
    try {
      names = await readdir(this.cacheDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new ExternalCollaboratorError('cache store', `cannot list ${this.cacheDir}`, error);
    }

    const entries: CacheEntryMeta[] = [];
    for (const name of names) {
      const match = ENTRY_FILE_PATTERN.exec(name);
      if (!match) continue;

      const path = join(this.cacheDir, name);
      const meta = decodeCacheMeta(await readHead(path), path);
      if (meta.sequence !== Number(match[1])) {
        throw new ExternalCollaboratorError(
          'cache store',
          `${path}: file name does not match sequence ${meta.sequence}`
        );
      }
      entries.push(meta);
    }

    entries.sort((a, b) => a.sequence - b.sequence);
    log.debug(`listed ${entries.length} cache entries`, { dir: this.cacheDir });
    return entries;
  }

  async load(entry: CacheEntryMeta): Promise<XYTable> {
    const path = this.entryPath(entry.sequence);
    const { table } = decodeCacheFile(await readRequired(path), this.engine, path);
    return table;
  }

  write(key: string, table: XYTable, lineage: LineageRef): Promise<CacheEntryMeta> {
    const next = this.writeChain.then(() => this.writeNow(key, table, lineage));
    // 실패는 호출자가 next 로 받고, 체인은 다음 기록을 위해 계속됩니다.
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async writeNow(key: string, table: XYTable, lineage: LineageRef): Promise<CacheEntryMeta> {
    const stored = await this.readLineage();
    assertSameLineage(stored, lineage);

    await makeDirectory(this.cacheDir);
    if (stored === null) {
      await this.writeAtomic(this.lineagePath, formatLineage(lineage));
    }

    const meta: CacheEntryMeta = {
      key,
      sequence: nextSequence(await this.list()),
      writtenAt: this.clock().toISOString(),
      lineageId: lineage.id,
      names: table.names,
      rowCount: table.rowCount,
    };

    const path = this.entryPath(meta.sequence);
    await this.writeAtomic(path, encodeCacheFile(meta, table, this.engine));
    log.info(`cached '${key}'`, { path, rows: meta.rowCount });
    return meta;
  }

  private async writeAtomic(path: string, content: string): Promise<void> {
    const temp = `${path}.${process.pid}-${++this.tempCounter}.tmp`;
    try {
      await writeFile(temp, content, 'utf8');
      await rename(temp, path);
    } catch (error) {
      throw new ExternalCollaboratorError('cache store', `cannot write ${path}`, error);
    }
  }
}

// =============================================================================
// 파일 시스템 헬퍼
// =============================================================================

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw new ExternalCollaboratorError('cache store', `cannot read ${path}`, error);
  }
}

async function readRequired(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw new ExternalCollaboratorError('cache store', `cannot read ${path}`, error);
  }
}

async function makeDirectory(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (error) {
    throw new ExternalCollaboratorError('cache store', `cannot create ${path}`, error);
  }
}

/**
 * 메타데이터 구분선까지만 읽기
 *
 * 구분선이 없으면 파일 전체를 돌려주고, 해석 단계에서 손상으로 처리됩니다.
 */
async function readHead(path: string): Promise<string> {
  const marker = `\n${METADATA_SEPARATOR}\n`;
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw new ExternalCollaboratorError('cache store', `cannot read ${path}`, error);
  }

  try {
    const chunks: Buffer[] = [];
    let text = '';
    for (;;) {
      const buffer = Buffer.alloc(HEAD_CHUNK_SIZE);
      const { bytesRead } = await handle.read(buffer, 0, HEAD_CHUNK_SIZE, null);
      if (bytesRead === 0) return text;

      chunks.push(buffer.subarray(0, bytesRead));
      text = Buffer.concat(chunks).toString('utf8');
      const at = text.indexOf(marker);
      if (at >= 0) return text.slice(0, at + marker.length);
    }
  } catch (error) {
    throw new ExternalCollaboratorError('cache store', `cannot read ${path}`, error);
  } finally {
    await handle.close();
  }
}
