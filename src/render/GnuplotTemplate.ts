/**
 * GnuplotTemplate - gnuplot 스크립트 생성
 *
 * 스크립트 구성 (순서 고정):
 * 1. Preamble: 인코딩, 구분자, 헤더를 범례 제목으로, terminal, output
 * 2. Axes: 축마다 (x, y, x2, y2 순서) 로그 스케일, 범위, 레이블, 눈금
 * 3. Global appearance: 크기, 범례 위치, 격자
 * 4. Custom commands: 사용자 명령 줄
 * 5. plot 지시문: 시리즈마다 한 줄 (호출자 순서)
 */

import type { AxisId, AxisPair, AxisTics, PlotSize, PlotTemplateOptions, SeriesOptions } from '../types';

export const DEFAULT_TERMINAL = 'dumb';
export const DEFAULT_KEY_POSITION = 'top right';
export const DEFAULT_PLOT_SIZE: PlotSize = { width: 1, height: 1 };

const AXES: readonly AxisId[] = ['x', 'y', 'x2', 'y2'];

/**
 * 전체 스크립트
 *
 * @throws RangeError 시리즈가 하나도 없을 때
 */
export function buildPlotScript(options: PlotTemplateOptions): string {
  if (options.series.length === 0) {
    throw new RangeError('plot script needs at least one data series');
  }

  const lines: string[] = [
    '#!/usr/bin/env -S gnuplot -p',
    '# Preamble',
    'set encoding utf8',
    "set datafile separator ','",
    'set key autotitle columnhead',
    `set terminal ${options.terminal ?? DEFAULT_TERMINAL}`,
  ];
  if (options.output !== undefined) lines.push(`set output ${singleQuote(options.output)}`);
  lines.push('');

  lines.push('# Axes');
  for (const axis of AXES) {
    lines.push(...axisLines(axis, options));
  }
  lines.push('');

  const size = options.size ?? DEFAULT_PLOT_SIZE;
  lines.push('# Global appearance');
  lines.push(`set size ${size.width},${size.height}`);
  lines.push(`set key ${options.keyPosition ?? DEFAULT_KEY_POSITION}`);
  if (options.grid) lines.push('set grid');
  lines.push('');

  const custom = options.customLines ?? [];
  if (custom.length > 0) {
    lines.push('# Custom commands', ...custom, '');
  }

  lines.push('plot\\');
  lines.push(options.series.map(s => `\t${seriesLine(s)}`).join(',\\\n'));

  return `${lines.join('\n')}\n`;
}

/**
 * 축 하나의 설정 줄
 *
 * x2/y2 를 쓰는 시리즈가 있으면 눈금 설정이 없어도 그 축 눈금을 켭니다.
 */
function axisLines(axis: AxisId, options: PlotTemplateOptions): string[] {
  const lines: string[] = [];
  if (options.logScale?.includes(axis)) lines.push(`set logscale ${axis}`);

  const range = options.ranges?.[axis];
  if (range) lines.push(`set ${axis}range [${range.start}:${range.end}]`);

  const label = options.labels?.[axis];
  if (label !== undefined) lines.push(`set ${axis}label ${doubleQuote(label)}`);

  const tics = options.tics?.[axis];
  if (tics) {
    lines.push(`set ${axis}tics ${formatTics(tics)}`);
  } else if (usesSecondary(axis, options.series)) {
    lines.push(`set ${axis}tics`);
  }
  return lines;
}

function usesSecondary(axis: AxisId, series: readonly SeriesOptions[]): boolean {
  if (axis === 'x2') return series.some(s => s.axis?.x === 2);
  if (axis === 'y2') return series.some(s => s.axis?.y === 2);
  return false;
}

function formatTics(tics: AxisTics): string {
  if (tics.start === undefined || tics.end === undefined) {
    return `${tics.step}`;
  }
  return `${tics.start},${tics.step},${tics.end}`;
}

/**
 * 시리즈 한 줄
 *
 * @example
 * seriesLine({ dataPath: 'a.csv', title: 'A' });
 * // "'a.csv' using 1:2 axis x1y1 with points title \"A\""
 */
export function seriesLine(series: SeriesOptions): string {
  const axis: AxisPair = series.axis ?? { x: 1, y: 1 };
  let line = `${singleQuote(series.dataPath)} using 1:2 axis x${axis.x}y${axis.y} with ${series.plotType ?? 'points'}`;
  if (series.title !== undefined) {
    line += ` title ${doubleQuote(series.title)}`;
  }
  if (series.extra !== undefined && series.extra !== '') {
    line += ` ${series.extra}`;
  }
  return line;
}

function singleQuote(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

function doubleQuote(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
