/**
 * Transformer 인터페이스 및 파이프라인 타입 정의
 *
 * 데이터 변환 파이프라인의 핵심 추상화입니다.
 * - Transformer: 테이블을 받아 새 테이블을 돌려주는 순수 단계 (소문자 연산자)
 * - Dumper: 테이블을 바꾸지 않고 관찰만 하는 단계 (대문자 연산자)
 *
 * 파이프라인 구조:
 * Source | Cache → (Transformer | Dumper)* → 결과 테이블
 */

import type {
  DumpLetter,
  DumpOperator,
  LineageRef,
  TransformLetter,
  TransformOperator,
} from '../../types';
import type { XYTable } from '../../core/XYTable';
import { DuplicateKeyError, NonFiniteValueError } from '../../core/errors';

// =============================================================================
// 파이프라인 상태
// =============================================================================

/**
 * 실행 드라이버 상태
 *
 * INIT → RESOLVED → RUNNING → (DONE | FAILED)
 */
export enum PipelineState {
  /** 연산자 목록만 준비됨 */
  INIT = 'init',

  /** 시작 테이블 결정됨 (캐시 또는 원본) */
  RESOLVED = 'resolved',

  /** 연산자 실행 중 */
  RUNNING = 'running',

  /** 모든 연산자 완료 */
  DONE = 'done',

  /** 연산자 실패로 중단 */
  FAILED = 'failed',
}

// =============================================================================
// Transformer / Dumper 인터페이스
// =============================================================================

/**
 * Transformer 인터페이스
 *
 * 데이터 변환의 기본 단위입니다.
 * 입력 테이블을 바꾸지 않고 새 테이블을 돌려줘야 합니다.
 */
export interface Transformer {
  /** Transformer 이름 (로그, 에러 메시지용) */
  readonly name: string;

  /** 연산자 문자 */
  readonly letter: TransformLetter;

  /**
   * 변환 실행
   *
   * @throws NonFiniteValueError, DuplicateKeyError
   */
  transform(table: XYTable): XYTable;
}

/**
 * 덤프 실행 컨텍스트
 */
export interface DumpContext {
  /** 현재 테이블 */
  readonly table: XYTable;

  /** 이 위치까지의 캐시 키 (덤프 제외) */
  readonly key: string;

  /** 이 위치까지의 정규 시퀀스 (덤프 포함) */
  readonly sequence: string;

  /** 실행 계보 (없으면 캐시 기록 불가) */
  readonly lineage: LineageRef | null;
}

/**
 * Dumper 인터페이스
 *
 * 테이블을 관찰만 합니다. 외부 I/O 가 있을 수 있어 Promise 를 돌려줄 수 있습니다.
 */
export interface Dumper {
  readonly name: string;

  readonly letter: DumpLetter;

  dump(ctx: DumpContext): void | Promise<void>;
}

/**
 * 파이프라인 단계 (연산자 + 실행기)
 */
export type PipelineStep =
  | { readonly kind: 'transform'; readonly operator: TransformOperator; readonly transformer: Transformer }
  | { readonly kind: 'dump'; readonly operator: DumpOperator; readonly dumper: Dumper };

// =============================================================================
// 파이프라인 결과 / 옵션
// =============================================================================

/**
 * 파이프라인 실행 결과
 */
export interface PipelineResult {
  /** 최종 테이블 */
  table: XYTable;

  /** 최종 상태 (DONE) */
  state: PipelineState;

  /** 재사용한 캐시 키 (없으면 null) */
  resolvedKey: string | null;

  /** 캐시 덕분에 건너뛴 연산자 수 */
  skipped: number;

  /** 실제로 실행한 연산자 수 */
  executed: number;

  /** 실행 시간 (ms) */
  executionTime: number;

  /** 단계별 실행 시간 (debug 옵션) */
  stepTimings?: Map<string, number>;
}

/**
 * 파이프라인 옵션
 */
export interface PipelineOptions {
  /** 디버그 모드 (단계별 타이밍 기록) */
  debug?: boolean;
}

/**
 * 파이프라인 시작점 (RESOLVED 전이 입력)
 */
export interface PipelineStart {
  /** 시작 테이블 */
  table: XYTable;

  /** 건너뛸 연산자 수 */
  skip: number;

  /** 재사용한 캐시 키 */
  resolvedKey: string | null;

  /** 실행 계보 */
  lineage: LineageRef | null;
}

// =============================================================================
// 헬퍼 함수
// =============================================================================

/**
 * x 기준 안정 정렬 인덱스
 *
 * @throws NonFiniteValueError x 에 Infinity/NaN 이 있으면
 */
export function sortedIndicesByX(table: XYTable, operator: string): number[] {
  const { xs } = table;
  for (let i = 0; i < xs.length; i++) {
    if (!Number.isFinite(xs[i])) {
      throw new NonFiniteValueError(operator, 'x', i);
    }
  }

  // Array.prototype.sort 는 안정 정렬
  const indices = Array.from({ length: xs.length }, (_, i) => i);
  indices.sort((a, b) => xs[a] - xs[b]);
  return indices;
}

/**
 * 정렬된 테이블의 x 중복 검사
 *
 * @throws DuplicateKeyError
 */
export function assertUniqueSortedX(table: XYTable, operator: string): void {
  const { xs } = table;
  for (let i = 1; i < xs.length; i++) {
    if (xs[i] === xs[i - 1]) {
      throw new DuplicateKeyError(operator, xs[i]);
    }
  }
}

/**
 * 출력 테이블의 값이 모두 유한한지 검사
 *
 * @throws NonFiniteValueError
 */
export function assertFinite(table: XYTable, operator: string): XYTable {
  for (let i = 0; i < table.rowCount; i++) {
    if (!Number.isFinite(table.xs[i])) {
      throw new NonFiniteValueError(operator, 'x', i);
    }
    if (!Number.isFinite(table.ys[i])) {
      throw new NonFiniteValueError(operator, 'y', i);
    }
  }
  return table;
}
