/**
 * OperatorParser - 연산자 시퀀스 파서
 *
 * `iCd1000,0Cc` 같은 문자열을 왼쪽에서 오른쪽으로 한 번 훑어 연산자 목록으로 바꿉니다.
 * 되돌아가기(backtracking)는 없습니다.
 *
 * 문법:
 *   sequence = { letter [ number { "," number } ] }
 *   number   = [ "+" | "-" ] ( digits [ "." digits? ] | "." digits )
 *
 * 정규화 규칙 (캐시 키):
 * - 숫자는 가장 짧은 왕복 표현으로 출력 (`1000.0` → `1000`)
 * - 기본값과 같은 꼬리 인자는 생략 (`d1000,0` → `d1000`, `d0,0` → `d`)
 */

import type {
  DumpOperator,
  Operator,
  OperatorLetter,
  TransformOperator,
} from '../../types';
import { ParseError } from '../../core/errors';
import { OPERATOR_SPECS, isOperatorLetter } from './operatorTable';

// =============================================================================
// 토큰 규칙
// =============================================================================

const LETTER_PATTERN = /^[A-Za-z]$/;
const ARGUMENT_CHAR_PATTERN = /^[0-9.,+-]$/;
const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

// =============================================================================
// 파싱
// =============================================================================

/**
 * 연산자 시퀀스 파싱
 *
 * @throws ParseError 알 수 없는 문자, 잘못된 숫자, 인자 초과, 끝이 잘린 토큰
 *
 * @example
 * parseOperatorSequence('od1000P');
 * // [{ letter: 'o', ... }, { letter: 'd', window: { left: 1000, right: 0 }, ... }, { letter: 'P', ... }]
 */
export function parseOperatorSequence(input: string): Operator[] {
  const operators: Operator[] = [];
  let pos = 0;

  while (pos < input.length) {
    const ch = input.charAt(pos);

    if (!LETTER_PATTERN.test(ch)) {
      throw new ParseError(`expected an operator letter, found '${ch}'`, input, pos);
    }
    if (!isOperatorLetter(ch)) {
      throw new ParseError(`unknown operator '${ch}'`, input, pos);
    }

    // 인자 영역: 다음 문자(알파벳)가 나오기 전까지
    let end = pos + 1;
    while (end < input.length && ARGUMENT_CHAR_PATTERN.test(input.charAt(end))) {
      end++;
    }

    const args = end > pos + 1 ? parseArguments(input, pos + 1, end) : [];
    operators.push(buildOperator(ch, args, input, pos));
    pos = end;
  }

  return operators;
}

/**
 * 쉼표로 구분된 숫자 인자 파싱
 */
function parseArguments(input: string, start: number, end: number): number[] {
  const values: number[] = [];
  let offset = start;

  for (const part of input.slice(start, end).split(',')) {
    if (part === '') {
      throw new ParseError('empty argument', input, offset);
    }
    if (!NUMBER_PATTERN.test(part)) {
      throw new ParseError(`malformed argument '${part}'`, input, offset);
    }

    const value = Number(part);
    if (!Number.isFinite(value)) {
      throw new ParseError(`argument '${part}' is not a finite number`, input, offset);
    }

    values.push(value);
    offset += part.length + 1;
  }

  return values;
}

/**
 * 문자와 인자로 연산자 생성
 */
function buildOperator(
  letter: OperatorLetter,
  args: number[],
  input: string,
  position: number
): Operator {
  const spec = OPERATOR_SPECS[letter];
  const defaults: readonly number[] = spec.defaults;

  if (args.length > defaults.length) {
    throw new ParseError(
      `${spec.name} takes at most ${defaults.length} argument(s), got ${args.length}`,
      input,
      position
    );
  }

  const values = defaults.map((fallback, i) => (i < args.length ? args[i] : fallback));
  const canonical = canonicalToken(letter, values, defaults);

  switch (letter) {
    case 'a':
    case 'd': {
      const [left, right] = values;
      if (left < 0 || right < 0) {
        throw new ParseError(`${spec.name} window must not be negative`, input, position);
      }
      return { kind: 'transform', letter, window: { left, right }, position, canonical };
    }
    case 'c':
    case 'f':
    case 'i':
    case 'm':
    case 'o':
    case 'r':
    case 's':
    case 'u':
      return { kind: 'transform', letter, position, canonical };
    case 'C':
    case 'O':
    case 'P':
      return { kind: 'dump', letter, position, canonical };
  }
}

// =============================================================================
// 정규화
// =============================================================================

/**
 * 숫자 정규 표현 (-0 은 0)
 */
export function formatNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}

function canonicalToken(
  letter: OperatorLetter,
  values: readonly number[],
  defaults: readonly number[]
): string {
  let count = values.length;
  while (count > 0 && values[count - 1] === defaults[count - 1]) {
    count--;
  }
  return letter + values.slice(0, count).map(formatNumber).join(',');
}

// =============================================================================
// 시퀀스 헬퍼
// =============================================================================

export function isTransform(op: Operator): op is TransformOperator {
  return op.kind === 'transform';
}

export function isDump(op: Operator): op is DumpOperator {
  return op.kind === 'dump';
}

/**
 * 연산자 목록을 정규 문자열로 복원
 *
 * @param includeDumps - false 면 덤프 문자를 뺀 캐시 키를 만듭니다.
 */
export function formatSequence(operators: readonly Operator[], includeDumps = true): string {
  return operators
    .filter(op => includeDumps || isTransform(op))
    .map(op => op.canonical)
    .join('');
}

/**
 * 덤프 문자를 뺀 변환 토큰 목록
 */
export function transformTokens(operators: readonly Operator[]): string[] {
  return operators.filter(isTransform).map(op => op.canonical);
}

/**
 * 각 위치까지의 캐시 키 (덤프 제외 누적 프리픽스)
 *
 * @example
 * prefixKeys(parseOperatorSequence('iCd1000C'));
 * // ['i', 'i', 'id1000', 'id1000']
 */
export function prefixKeys(operators: readonly Operator[]): string[] {
  const keys: string[] = [];
  let key = '';
  for (const op of operators) {
    if (isTransform(op)) {
      key += op.canonical;
    }
    keys.push(key);
  }
  return keys;
}

/**
 * 저장된 캐시 키를 토큰 목록으로 분해
 *
 * @throws ParseError 키가 문법에 맞지 않거나 덤프 문자를 포함할 때
 */
export function tokenizeKey(key: string): string[] {
  const operators = parseOperatorSequence(key);
  const dump = operators.find(isDump);
  if (dump) {
    throw new ParseError(`cache key must not contain dump operator '${dump.letter}'`, key, dump.position);
  }
  return operators.map(op => op.canonical);
}
