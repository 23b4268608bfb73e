/**
 * 캐시 파일 코덱
 *
 * 파일 구조:
 *   {JSON 메타데이터}
 *   ---- end of metadata ----
 *   x이름,y이름
 *   1,2
 *   ...
 *
 * 컬럼 이름은 메타데이터의 names 를 기준으로 삼고, CSV 헤더는 사람이 읽기 위한 것입니다.
 */

import type { CacheEntryMeta } from '../../types';
import { XYTable } from '../../core/XYTable';
import { ExternalCollaboratorError } from '../../core/errors';
import type { IEngine } from '../engines/IEngine';
import { parseNumberCell } from '../engines/ArqueroEngine';
import { isRecord } from './lineage';

export const METADATA_SEPARATOR = '---- end of metadata ----';

/**
 * 캐시 파일 내용
 */
export interface CacheFileContent {
  readonly meta: CacheEntryMeta;
  readonly table: XYTable;
}

// =============================================================================
// 인코딩
// =============================================================================

export function encodeCacheFile(meta: CacheEntryMeta, table: XYTable, engine: IEngine): string {
  return `${JSON.stringify(meta, null, 2)}\n${METADATA_SEPARATOR}\n${engine.formatTable(table, true)}`;
}

// =============================================================================
// 디코딩
// =============================================================================

/**
 * 메타데이터 부분만 해석
 *
 * @throws ExternalCollaboratorError
 */
export function decodeCacheMeta(text: string, location: string): CacheEntryMeta {
  return parseMeta(splitCacheFile(text, location).head, location);
}

/**
 * 캐시 파일 전체 해석
 *
 * @throws ExternalCollaboratorError 구분선이 없거나 메타데이터/본문이 깨졌을 때
 */
export function decodeCacheFile(text: string, engine: IEngine, location: string): CacheFileContent {
  const { head, body } = splitCacheFile(text, location);
  const meta = parseMeta(head, location);

  const sheet = engine.parseSheet(body, true);
  if (sheet.rowCount !== meta.rowCount) {
    throw corrupt(location, `expected ${meta.rowCount} rows, found ${sheet.rowCount}`);
  }
  if (sheet.rowCount > 0 && sheet.columns.length !== 2) {
    throw corrupt(location, `expected 2 columns, found ${sheet.columns.length}`);
  }

  const [xCells = [], yCells = []] = sheet.columns;
  const xs = xCells.map((cell, row) => payloadNumber(cell, row, location));
  const ys = yCells.map((cell, row) => payloadNumber(cell, row, location));

  return { meta, table: XYTable.fromColumns(xs, ys, meta.names) };
}

function splitCacheFile(text: string, location: string): { head: string; body: string } {
  const marker = `\n${METADATA_SEPARATOR}\n`;
  const at = text.indexOf(marker);
  if (at < 0) {
    throw corrupt(location, 'metadata separator not found');
  }
  return { head: text.slice(0, at), body: text.slice(at + marker.length) };
}

function parseMeta(head: string, location: string): CacheEntryMeta {
  let raw: unknown;
  try {
    raw = JSON.parse(head);
  } catch (error) {
    throw new ExternalCollaboratorError('cache store', `${location}: metadata is not valid JSON`, error);
  }
  if (!isRecord(raw)) {
    throw corrupt(location, 'metadata is not an object');
  }

  const { key, sequence, writtenAt, lineageId, names, rowCount } = raw;
  const xName = isRecord(names) ? names['x'] : undefined;
  const yName = isRecord(names) ? names['y'] : undefined;
  if (
    typeof key !== 'string' ||
    typeof sequence !== 'number' ||
    typeof writtenAt !== 'string' ||
    typeof lineageId !== 'string' ||
    typeof rowCount !== 'number' ||
    typeof xName !== 'string' ||
    typeof yName !== 'string'
  ) {
    throw corrupt(location, 'metadata fields are missing');
  }

  return { key, sequence, writtenAt, lineageId, names: { x: xName, y: yName }, rowCount };
}

function payloadNumber(cell: string, row: number, location: string): number {
  const value = parseNumberCell(cell);
  if (value === null) {
    throw corrupt(location, `row ${row + 1} holds '${cell}', not a number`);
  }
  return value;
}

function corrupt(location: string, detail: string): ExternalCollaboratorError {
  return new ExternalCollaboratorError('cache store', `${location}: ${detail}`);
}
