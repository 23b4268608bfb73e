/**
 * 연산자 타입 정의
 *
 * 연산자 시퀀스(`-e iCd1000P`)를 구성하는 연산자의 태그 유니온입니다.
 * 소문자는 테이블을 바꾸는 변환(transform), 대문자는 테이블을 관찰만 하는
 * 덤프(dump) 연산자입니다.
 */

// ============================================================================
// 연산자 문자
// ============================================================================

/** 윈도우 인자를 받는 변환 연산자 */
export type WindowedTransformLetter = 'a' | 'd';

/** 인자가 없는 변환 연산자 */
export type PlainTransformLetter = 'c' | 'f' | 'i' | 'm' | 'o' | 'r' | 's' | 'u';

/** 변환 연산자 문자 */
export type TransformLetter = WindowedTransformLetter | PlainTransformLetter;

/**
 * 덤프 연산자 문자
 *
 * - C: 캐시 기록
 * - O: 터미널 출력
 * - P: 플롯
 */
export type DumpLetter = 'C' | 'O' | 'P';

/** 전체 연산자 알파벳 */
export type OperatorLetter = TransformLetter | DumpLetter;

// ============================================================================
// 연산자
// ============================================================================

/**
 * x 축 기준 윈도우 (left, right)
 */
export interface XWindow {
  readonly left: number;
  readonly right: number;
}

/**
 * 모든 연산자의 공통 필드
 */
interface OperatorBase {
  /** 시퀀스 문자열에서 연산자 문자의 위치 (0부터) */
  readonly position: number;

  /** 정규화된 문자열 표현 (캐시 키의 토큰) */
  readonly canonical: string;
}

/** 윈도우 변환 연산자 (a, d) */
export interface WindowedTransformOperator extends OperatorBase {
  readonly kind: 'transform';
  readonly letter: WindowedTransformLetter;
  readonly window: XWindow;
}

/** 인자 없는 변환 연산자 */
export interface PlainTransformOperator extends OperatorBase {
  readonly kind: 'transform';
  readonly letter: PlainTransformLetter;
}

/** 덤프 연산자 */
export interface DumpOperator extends OperatorBase {
  readonly kind: 'dump';
  readonly letter: DumpLetter;
}

export type TransformOperator = WindowedTransformOperator | PlainTransformOperator;

/**
 * 파서가 만드는 연산자
 *
 * 한 번 만들어지고 드라이버가 한 번 소비합니다.
 */
export type Operator = TransformOperator | DumpOperator;

// ============================================================================
// 연산자 명세
// ============================================================================

/**
 * 연산자 문자별 고정 계약 (인자 개수, 기본값)
 */
export interface OperatorSpec {
  readonly letter: OperatorLetter;

  readonly kind: Operator['kind'];

  /** 사람이 읽는 이름 (에러 메시지, 로그용) */
  readonly name: string;

  /** 인자 기본값. 길이가 곧 최대 인자 개수입니다. */
  readonly defaults: readonly number[];
}
