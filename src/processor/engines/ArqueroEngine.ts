/**
 * ArqueroEngine - Arquero 기반 테이블 엔진
 *
 * IEngine 인터페이스를 구현한 Arquero 엔진입니다.
 *
 * XYTable 은 내부적으로 `x`, `y` 두 컬럼의 Arquero 테이블로 옮겨 처리합니다.
 * 사용자 컬럼 이름은 서로 같을 수도 있으므로 Arquero 테이블에는 싣지 않고
 * 결과를 XYTable 로 되돌릴 때 다시 붙입니다.
 */

import * as aq from 'arquero';
import type { ColumnNames } from '../../types';
import { XYTable } from '../../core/XYTable';
import type { IEngine, RawSheet } from './IEngine';

type ColumnTable = ReturnType<typeof aq.table>;

/** Arquero 테이블 한 행 */
interface XYRecord {
  x: number;
  y: number;
}

/**
 * Arquero 기반 테이블 엔진
 */
export class ArqueroEngine implements IEngine {
  // ==========================================================================
  // 관계형 연산
  // ==========================================================================

  filterFinite(table: XYTable): XYTable {
    const filtered = toColumnTable(table).filter(
      aq.escape((d: XYRecord) => Number.isFinite(d.y))
    );
    return fromColumnTable(filtered, table.names);
  }

  uniqueByX(table: XYTable): XYTable {
    return fromColumnTable(toColumnTable(table).dedupe('x'), table.names);
  }

  // ==========================================================================
  // CSV 입출력
  // ==========================================================================

  parseSheet(text: string, hasHeader: boolean): RawSheet {
    if (text.trim() === '') {
      return { header: hasHeader ? [] : null, columns: [], rowCount: 0 };
    }

    // 헤더 이름이 중복될 수 있어 항상 header: false 로 읽고 첫 행을 직접 떼어냅니다.
    const parsed = aq.fromCSV(text, { header: false, autoType: false });
    const columns = parsed.columnNames().map(name => cellStrings(parsed.array(name)));

    if (!hasHeader) {
      return { header: null, columns, rowCount: parsed.numRows() };
    }

    return {
      header: columns.map(cells => cells[0] ?? ''),
      columns: columns.map(cells => cells.slice(1)),
      rowCount: Math.max(parsed.numRows() - 1, 0),
    };
  }

  formatTable(table: XYTable, header: boolean): string {
    const lines: string[] = [];
    if (header) {
      lines.push(`${quoteCell(table.names.x)},${quoteCell(table.names.y)}`);
    }
    for (let i = 0; i < table.rowCount; i++) {
      lines.push(`${formatCell(table.xs[i])},${formatCell(table.ys[i])}`);
    }
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }
}

// =============================================================================
// 변환 헬퍼
// =============================================================================

function toColumnTable(table: XYTable): ColumnTable {
  return aq.table({ x: table.xs.slice(), y: table.ys.slice() });
}

function fromColumnTable(table: ColumnTable, names: ColumnNames): XYTable {
  return XYTable.fromColumns(numericColumn(table, 'x'), numericColumn(table, 'y'), names);
}

function numericColumn(table: ColumnTable, name: 'x' | 'y'): number[] {
  const values: ArrayLike<unknown> = table.array(name);
  const result = new Array<number>(values.length);
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (typeof value !== 'number') {
      throw new TypeError(`column ${name} row ${i} is not a number`);
    }
    result[i] = value;
  }
  return result;
}

function cellStrings(values: ArrayLike<unknown>): string[] {
  return Array.from(values, value => (typeof value === 'string' ? value : ''));
}

// =============================================================================
// 셀 인코딩
// =============================================================================

const NEEDS_QUOTE = /[",\r\n]/;

/**
 * RFC 4180 셀 인용
 */
export function quoteCell(value: string): string {
  return NEEDS_QUOTE.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * 숫자 셀 (-0 은 0)
 */
function formatCell(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}

const NAN_PATTERN = /^nan$/i;
const INFINITY_PATTERN = /^([+-]?)inf(?:inity)?$/i;
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * 숫자 셀 파싱
 *
 * 10진수와 지수 표기, `nan`, `inf`, `infinity` (대소문자 무관, 부호 허용)를 받습니다.
 *
 * @returns 숫자가 아니면 null
 */
export function parseNumberCell(text: string): number | null {
  const cell = text.trim();
  if (NAN_PATTERN.test(cell)) return NaN;

  const infinity = INFINITY_PATTERN.exec(cell);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }

  return DECIMAL_PATTERN.test(cell) ? Number(cell) : null;
}
