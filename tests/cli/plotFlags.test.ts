/**
 * 플롯 모양 옵션 테스트
 */

import { describe, it, expect } from 'vitest';
import { parsePlotFlags, splitList } from '../../src/cli/plotFlags';

describe('splitList', () => {
  it('기본 구분자는 쉼표', () => {
    expect(splitList('x,y2')).toEqual(['x', 'y2']);
  });

  it('첫 글자가 문장 부호면 그 글자로 나눔', () => {
    expect(splitList('|x=a, b|y=c')).toEqual(['x=a, b', 'y=c']);
  });

  it('빈 문자열은 빈 목록', () => {
    expect(splitList('')).toEqual([]);
  });
});

describe('parsePlotFlags', () => {
  it('모든 옵션', () => {
    const appearance = parsePlotFlags({
      label: 'x=Time,Y2=Rate',
      log: 'x,y',
      range: 'x=0:10,y=-1.5:2',
      tics: 'x=0.5,y2=0:2:10',
      size: '1,0.75',
      kpos: 'bottom left',
      grid: true,
      gpout: 'plot.png',
    });

    expect(appearance).toEqual({
      labels: { x: 'Time', y2: 'Rate' },
      logScale: ['x', 'y'],
      ranges: { x: { start: 0, end: 10 }, y: { start: -1.5, end: 2 } },
      tics: { x: { step: 0.5 }, y2: { start: 0, step: 2, end: 10 } },
      size: { width: 1, height: 0.75 },
      keyPosition: 'bottom left',
      grid: true,
      output: 'plot.png',
    });
  });

  it('옵션이 없으면 모두 비어 있음', () => {
    expect(parsePlotFlags({})).toEqual({});
  });

  it('잘못된 값은 UsageError', () => {
    expect(() => parsePlotFlags({ log: 'z' })).toThrow("--log: unknown axis 'z' (x, y, x2 or y2)");
    expect(() => parsePlotFlags({ label: 'Time' })).toThrow("--label: 'Time' is not AXIS=VALUE");
    expect(() => parsePlotFlags({ range: 'x=0' })).toThrow("--range: range must look like START:END, got '0'");
    expect(() => parsePlotFlags({ range: 'x=a:1' })).toThrow("--range: 'a' is not a number");
    expect(() => parsePlotFlags({ tics: 'x=0:1' })).toThrow(
      "--tics: tics must look like STEP or START:STEP:END, got '0:1'"
    );
    expect(() => parsePlotFlags({ size: '1' })).toThrow("--size must look like WIDTH,HEIGHT, got '1'");
  });
});
