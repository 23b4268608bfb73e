/**
 * SourceReader - 원본 CSV 에서 x/y 테이블 만들기
 *
 * 축 선택자:
 * - `$3`            : 1부터 시작하는 컬럼 번호
 * - `$price`        : 헤더 이름
 * - `${unit price}` : 공백 등이 들어간 헤더 이름
 * - `1.5`           : 모든 행에 같은 상수
 *
 * 입력이 `-` 이면 stdin 에서 읽고, 이때는 다시 열 수 없으므로 계보가 없습니다.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ColumnSelector, LineageRecord, LineageRef } from '../types';
import { XYTable } from '../core/XYTable';
import { SourceError } from '../core/errors';
import { createLogger } from '../core/logger';
import type { IEngine, RawSheet } from '../processor/engines/IEngine';
import { ArqueroEngine, parseNumberCell } from '../processor/engines/ArqueroEngine';
import { createLineage } from '../processor/cache/lineage';

const log = createLogger('SourceReader');

export const STDIN_INPUT = '-';

// =============================================================================
// 선택자
// =============================================================================

const INDEX_SELECTOR = /^\$(\d+)$/;
const BRACED_SELECTOR = /^\$\{(.+)\}$/;
const NAME_SELECTOR = /^\$(.+)$/;

/**
 * 선택자 문자열 해석
 *
 * @throws SourceError
 *
 * @example
 * parseSelector('$2');        // { kind: 'index', index: 2 }
 * parseSelector('${a b}');    // { kind: 'name', name: 'a b' }
 * parseSelector('0.5');       // { kind: 'constant', value: 0.5 }
 */
export function parseSelector(text: string): ColumnSelector {
  const index = INDEX_SELECTOR.exec(text);
  if (index) {
    const value = Number(index[1]);
    if (value < 1) {
      throw new SourceError(`column index in '${text}' starts at 1`);
    }
    return { kind: 'index', index: value };
  }

  const braced = BRACED_SELECTOR.exec(text) ?? NAME_SELECTOR.exec(text);
  if (braced) {
    return { kind: 'name', name: braced[1] };
  }

  const constant = parseNumberCell(text);
  if (constant !== null && Number.isFinite(constant)) {
    return { kind: 'constant', value: constant };
  }

  throw new SourceError(`invalid column selector '${text}'`);
}

// =============================================================================
// SourceReader 클래스
// =============================================================================

/**
 * 원본 요청
 */
export interface SourceRequest {
  /** 파일 경로 또는 `-` */
  readonly input: string;

  readonly hasHeader: boolean;

  /** x 선택자 원문 */
  readonly x: string;

  /** y 선택자 원문 */
  readonly y: string;
}

export interface SourceReaderOptions {
  engine?: IEngine;

  /** stdin 읽기 (테스트에서 교체) */
  readStdin?: () => Promise<string>;

  /** 상대 경로 기준 디렉터리 */
  cwd?: string;
}

export class SourceReader {
  private readonly engine: IEngine;

  private readonly readStdin: () => Promise<string>;

  private readonly cwd: string;

  constructor(options: SourceReaderOptions = {}) {
    this.engine = options.engine ?? new ArqueroEngine();
    this.readStdin = options.readStdin ?? readProcessStdin;
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * 요청의 계보 (stdin 이면 null)
   */
  lineageFor(request: SourceRequest): LineageRef | null {
    if (request.input === STDIN_INPUT) return null;

    const record: LineageRecord = {
      source: resolve(this.cwd, request.input),
      hasHeader: request.hasHeader,
      x: request.x,
      y: request.y,
    };
    return createLineage(record);
  }

  /**
   * 원본을 읽어 테이블 생성
   *
   * @throws SourceError 파일을 읽을 수 없거나 셀이 숫자가 아닐 때
   */
  async read(request: SourceRequest): Promise<XYTable> {
    const text = await this.readText(request.input);
    return this.parse(text, request);
  }

  /**
   * 텍스트에서 테이블 생성
   */
  parse(text: string, request: SourceRequest): XYTable {
    const sheet = this.engine.parseSheet(text, request.hasHeader);
    const xSelector = parseSelector(request.x);
    const ySelector = parseSelector(request.y);

    const table = XYTable.fromColumns(
      selectColumn(sheet, xSelector, request.x),
      selectColumn(sheet, ySelector, request.y),
      {
        x: columnName(sheet, xSelector, request.x),
        y: columnName(sheet, ySelector, request.y),
      }
    );
    log.debug(`loaded ${table.rowCount} rows`, { input: request.input });
    return table;
  }

  private async readText(input: string): Promise<string> {
    if (input === STDIN_INPUT) {
      return this.readStdin();
    }
    const path = resolve(this.cwd, input);
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      throw new SourceError(`cannot read ${path}`, error);
    }
  }
}

// =============================================================================
// 헬퍼
// =============================================================================

async function readProcessStdin(): Promise<string> {
  process.stdin.setEncoding('utf8');
  let text = '';
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

function columnIndex(sheet: RawSheet, selector: ColumnSelector, text: string): number {
  switch (selector.kind) {
    case 'index':
      if (selector.index > sheet.columns.length && sheet.rowCount > 0) {
        throw new SourceError(`'${text}' selects column ${selector.index}, input has ${sheet.columns.length}`);
      }
      return selector.index - 1;
    case 'name': {
      if (sheet.header === null) {
        throw new SourceError(`'${text}' selects by name but the input has no header row`);
      }
      const at = sheet.header.indexOf(selector.name);
      if (at < 0) {
        throw new SourceError(`no column named '${selector.name}'`);
      }
      return at;
    }
    case 'constant':
      return -1;
  }
}

function selectColumn(sheet: RawSheet, selector: ColumnSelector, text: string): number[] {
  if (selector.kind === 'constant') {
    return new Array<number>(sheet.rowCount).fill(selector.value);
  }

  const index = columnIndex(sheet, selector, text);
  const cells = sheet.columns[index] ?? [];
  const values = new Array<number>(sheet.rowCount);
  for (let row = 0; row < sheet.rowCount; row++) {
    const cell = cells[row] ?? '';
    const value = parseNumberCell(cell);
    if (value === null) {
      throw new SourceError(`row ${row + 1}, column ${index + 1}: '${cell}' is not a number`);
    }
    values[row] = value;
  }
  return values;
}

function columnName(sheet: RawSheet, selector: ColumnSelector, text: string): string {
  if (selector.kind === 'name') return selector.name;
  if (selector.kind === 'index' && sheet.header !== null) {
    return sheet.header[selector.index - 1] ?? text;
  }
  return text;
}
