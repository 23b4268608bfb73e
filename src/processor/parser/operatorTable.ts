/**
 * 연산자 알파벳 표
 *
 * 문자마다 종류, 이름, 인자 기본값(= 최대 인자 개수)이 고정되어 있습니다.
 */

import type { OperatorLetter, OperatorSpec } from '../../types';

export const OPERATOR_SPECS = {
  a: { letter: 'a', kind: 'transform', name: 'Average', defaults: [0, 0] },
  c: { letter: 'c', kind: 'transform', name: 'CDF', defaults: [] },
  d: { letter: 'd', kind: 'transform', name: 'Derivation', defaults: [0, 0] },
  f: { letter: 'f', kind: 'transform', name: 'FiniteFilter', defaults: [] },
  i: { letter: 'i', kind: 'transform', name: 'Integral', defaults: [] },
  m: { letter: 'm', kind: 'transform', name: 'Merge', defaults: [] },
  o: { letter: 'o', kind: 'transform', name: 'Sort', defaults: [] },
  r: { letter: 'r', kind: 'transform', name: 'Rotate', defaults: [] },
  s: { letter: 's', kind: 'transform', name: 'Step', defaults: [] },
  u: { letter: 'u', kind: 'transform', name: 'Unique', defaults: [] },
  C: { letter: 'C', kind: 'dump', name: 'CacheWrite', defaults: [] },
  O: { letter: 'O', kind: 'dump', name: 'Output', defaults: [] },
  P: { letter: 'P', kind: 'dump', name: 'Plot', defaults: [] },
} as const satisfies Record<OperatorLetter, OperatorSpec>;

/**
 * 문자가 알파벳에 속하는지 확인
 */
export function isOperatorLetter(ch: string): ch is OperatorLetter {
  return Object.prototype.hasOwnProperty.call(OPERATOR_SPECS, ch);
}

/**
 * 도움말용 연산자 설명
 */
export const OPERATOR_HELP = `OPSEQ = {operator[arg{,arg}]}+
  a[left,right]  moving average of y over x in [x-left, x+right]
  c              cdf of y
  d[left,right]  derivation, emitted once x advanced left+right
  f              drop rows with non-finite y
  i              integral over x
  m              merge (sum y over runs of equal x)
  o              sort by x
  r              rotate (swap x and y)
  s              step (difference of consecutive y)
  u              unique (first row of each x)
  C              write the current table to the cache
  O              print the current table
  P              plot the current table`;
