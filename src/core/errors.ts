/**
 * 파이프라인 에러 타입
 *
 * 모든 에러는 현재 실행에 대해 종료(terminal)입니다.
 * 내부에서 재시도하지 않고, 드라이버가 첫 에러를 그대로 올려 보냅니다.
 */

/**
 * 에러 코드
 */
export type PipelineErrorCode =
  | 'PARSE'
  | 'NON_FINITE'
  | 'DUPLICATE_KEY'
  | 'LINEAGE_MISMATCH'
  | 'CACHE_WRITE_REFUSED'
  | 'EXTERNAL'
  | 'SOURCE';

/**
 * 모든 파이프라인 에러의 기반 클래스
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * 연산자 시퀀스 문법 오류
 */
export class ParseError extends PipelineError {
  /** 문제가 된 문자 위치 (0부터) */
  readonly position: number;

  constructor(message: string, input: string, position: number) {
    super('PARSE', `${message} (at ${position} in "${input}")`);
    this.position = position;
  }
}

/**
 * 유한하지 않은 값(Infinity, NaN)을 만나거나 만들었을 때
 */
export class NonFiniteValueError extends PipelineError {
  constructor(operator: string, column: 'x' | 'y', row: number) {
    super('NON_FINITE', `${operator}: non-finite ${column} value at row ${row}`);
  }
}

/**
 * 정렬 기반 연산자가 중복된 x 를 발견했을 때
 */
export class DuplicateKeyError extends PipelineError {
  constructor(operator: string, x: number) {
    super('DUPLICATE_KEY', `${operator}: x column contains duplicated value ${x}`);
  }
}

/**
 * 서로 다른 원본에서 만든 캐시를 섞으려 할 때
 */
export class LineageMismatchError extends PipelineError {
  constructor(expected: string, actual: string) {
    super(
      'LINEAGE_MISMATCH',
      `cache lineage ${actual.slice(0, 12)} does not match run lineage ${expected.slice(0, 12)}`
    );
  }
}

/**
 * 다시 열 수 있는 원본 없이 캐시 기록을 요청했을 때
 */
export class CacheWriteRefusedError extends PipelineError {
  constructor(reason: string) {
    super('CACHE_WRITE_REFUSED', `cache write refused: ${reason}`);
  }
}

/**
 * 렌더러/저장소 등 외부 협력자 실패
 */
export class ExternalCollaboratorError extends PipelineError {
  constructor(collaborator: string, message: string, cause?: unknown) {
    super('EXTERNAL', `${collaborator}: ${message}`, { cause });
  }
}

/**
 * 원본 데이터를 읽거나 해석할 수 없을 때
 */
export class SourceError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('SOURCE', message, { cause });
  }
}

/**
 * 에러와 원인 체인을 사람이 읽는 줄 목록으로 변환
 */
export function describeError(error: unknown): string[] {
  const lines: string[] = [];
  let current: unknown = error;
  while (current !== undefined && lines.length < 8) {
    if (current instanceof Error) {
      lines.push(current.message);
      current = current.cause;
    } else {
      lines.push(String(current));
      current = undefined;
    }
  }
  return lines;
}
