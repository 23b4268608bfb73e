/**
 * 플롯 모양 옵션 (seqplot, seqplot-multi 공용)
 *
 * 목록 값은 ',' 로 나눕니다. 첫 글자가 영숫자가 아니면 그 글자를 구분자로 씁니다.
 *
 * @example
 * --label 'x=Time,y=Cost'
 * --label '|x=a, b|y=c'
 * --range 'x=0:10,y2=-1:1'
 * --tics 'x=0.5,y=0:2:10'
 */

import type { AxisId, AxisRange, AxisTics, PlotAppearance, PlotSize } from '../types';
import { UsageError } from './io';

export const PLOT_FLAG_OPTIONS = {
  label: { type: 'string' },
  log: { type: 'string' },
  range: { type: 'string' },
  tics: { type: 'string' },
  size: { type: 'string' },
  kpos: { type: 'string' },
  grid: { type: 'boolean' },
  gpout: { type: 'string' },
} as const;

export const PLOT_FLAG_USAGE = `Plot appearance:
      --label <list>      axis labels, e.g. x=Time,y=Cost
      --log <list>        log-scale axes, e.g. x,y2
      --range <list>      axis ranges, e.g. x=0:10,y=-1:1
      --tics <list>       tic step or start:step:end per axis, e.g. x=0.5,y=0:2:10
      --size <w,h>        plot size (default: 1,1)
      --kpos <position>   legend position (default: top right)
      --grid              draw a grid
      --gpout <path>      gnuplot output file
  A list starting with a punctuation character uses it as the separator.`;

export interface PlotFlagValues {
  label?: string;
  log?: string;
  range?: string;
  tics?: string;
  size?: string;
  kpos?: string;
  grid?: boolean;
  gpout?: string;
}

/**
 * 명령행 값 → 플롯 모양
 *
 * @throws UsageError
 */
export function parsePlotFlags(values: PlotFlagValues): PlotAppearance {
  return {
    labels: values.label === undefined ? undefined : axisMap('label', values.label, text => text),
    logScale: values.log === undefined ? undefined : splitList(values.log).map(item => parseAxisId('log', item)),
    ranges: values.range === undefined ? undefined : axisMap('range', values.range, parseRange),
    tics: values.tics === undefined ? undefined : axisMap('tics', values.tics, parseTics),
    size: values.size === undefined ? undefined : parseSize(values.size),
    keyPosition: values.kpos,
    grid: values.grid,
    output: values.gpout,
  };
}

// =============================================================================
// 목록 / 값 해석
// =============================================================================

/**
 * @example
 * splitList('x,y2');  // ['x', 'y2']
 * splitList('|a,b|c'); // ['a,b', 'c']
 */
export function splitList(text: string): string[] {
  if (text === '') return [];
  const first = text[0];
  if (/^[0-9A-Za-z]$/.test(first)) {
    return text.split(',');
  }
  return text.slice(1).split(first);
}

function parseAxisId(flag: string, text: string): AxisId {
  switch (text.trim().toLowerCase()) {
    case 'x':
      return 'x';
    case 'y':
      return 'y';
    case 'x2':
      return 'x2';
    case 'y2':
      return 'y2';
    default:
      throw new UsageError(`--${flag}: unknown axis '${text}' (x, y, x2 or y2)`);
  }
}

function axisMap<T>(flag: string, text: string, parse: (value: string, flag: string) => T): Partial<Record<AxisId, T>> {
  const result: Partial<Record<AxisId, T>> = {};
  for (const item of splitList(text)) {
    const eq = item.indexOf('=');
    if (eq < 0) {
      throw new UsageError(`--${flag}: '${item}' is not AXIS=VALUE`);
    }
    result[parseAxisId(flag, item.slice(0, eq))] = parse(item.slice(eq + 1), flag);
  }
  return result;
}

function parseNumber(flag: string, text: string): number {
  const value = text.trim() === '' ? NaN : Number(text);
  if (!Number.isFinite(value)) {
    throw new UsageError(`--${flag}: '${text}' is not a number`);
  }
  return value;
}

function parseRange(text: string, flag: string): AxisRange {
  const parts = text.split(':');
  if (parts.length !== 2) {
    throw new UsageError(`--${flag}: range must look like START:END, got '${text}'`);
  }
  return { start: parseNumber(flag, parts[0]), end: parseNumber(flag, parts[1]) };
}

function parseTics(text: string, flag: string): AxisTics {
  const parts = text.split(':');
  if (parts.length === 1) {
    return { step: parseNumber(flag, parts[0]) };
  }
  if (parts.length !== 3) {
    throw new UsageError(`--${flag}: tics must look like STEP or START:STEP:END, got '${text}'`);
  }
  return {
    start: parseNumber(flag, parts[0]),
    step: parseNumber(flag, parts[1]),
    end: parseNumber(flag, parts[2]),
  };
}

function parseSize(text: string): PlotSize {
  const parts = text.split(',');
  if (parts.length !== 2) {
    throw new UsageError(`--size must look like WIDTH,HEIGHT, got '${text}'`);
  }
  return { width: parseNumber('size', parts[0]), height: parseNumber('size', parts[1]) };
}
