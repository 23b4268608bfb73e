/**
 * DataPipeline - 연산자 시퀀스 실행 드라이버
 *
 * 연산자를 한 번에 하나씩 순서대로 실행합니다.
 * 변환은 현재 테이블을 새 테이블로 바꾸고, 덤프는 현재 테이블을 그대로 관찰합니다.
 *
 * 상태 전이:
 * INIT --resolve()--> RESOLVED --run()--> RUNNING --> DONE
 *                                                 \-> FAILED (첫 에러에서 중단)
 *
 * 그 밖의 전이는 모두 에러입니다.
 */

import type { Operator } from '../../types';
import type { XYTable } from '../../core/XYTable';
import { createLogger } from '../../core/logger';
import { formatSequence, prefixKeys } from '../parser/OperatorParser';
import {
  PipelineState,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStart,
  type PipelineStep,
} from './Transformer';
import { createStep, type StepFactory } from './TransformerFactory';

const log = createLogger('DataPipeline');

/** 허용된 상태 전이 */
const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  [PipelineState.INIT]: [PipelineState.RESOLVED],
  [PipelineState.RESOLVED]: [PipelineState.RUNNING],
  [PipelineState.RUNNING]: [PipelineState.DONE, PipelineState.FAILED],
  [PipelineState.DONE]: [],
  [PipelineState.FAILED]: [],
};

// =============================================================================
// DataPipeline 클래스
// =============================================================================

export class DataPipeline {
  /** 실행 단계 (연산자 순서) */
  private readonly steps: readonly PipelineStep[];

  /** 위치별 캐시 키 (덤프 제외 누적 프리픽스) */
  private readonly keys: readonly string[];

  /** 위치별 정규 시퀀스 (덤프 포함 누적 프리픽스) */
  private readonly sequences: readonly string[];

  private readonly options: PipelineOptions;

  private state = PipelineState.INIT;

  private start: PipelineStart | null = null;

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(steps: readonly PipelineStep[], options: PipelineOptions = {}) {
    const operators = steps.map(step => step.operator);
    this.steps = steps;
    this.keys = prefixKeys(operators);
    this.sequences = operators.map((_, i) => formatSequence(operators.slice(0, i + 1)));
    this.options = {
      debug: false,
      ...options,
    };
  }

  /**
   * 연산자 목록으로 파이프라인 구성
   */
  static fromOperators(
    operators: readonly Operator[],
    factory: StepFactory,
    options: PipelineOptions = {}
  ): DataPipeline {
    return new DataPipeline(
      operators.map(op => createStep(op, factory)),
      options
    );
  }

  // ==========================================================================
  // 조회
  // ==========================================================================

  getState(): PipelineState {
    return this.state;
  }

  getSteps(): readonly PipelineStep[] {
    return this.steps;
  }

  // ==========================================================================
  // 상태 전이
  // ==========================================================================

  /**
   * 시작 테이블 결정 (INIT → RESOLVED)
   *
   * @throws RangeError skip 이 단계 수를 벗어날 때
   */
  resolve(start: PipelineStart): this {
    if (!Number.isInteger(start.skip) || start.skip < 0 || start.skip > this.steps.length) {
      throw new RangeError(`cannot skip ${start.skip} of ${this.steps.length} operators`);
    }
    this.transition(PipelineState.RESOLVED);
    this.start = start;
    return this;
  }

  /**
   * 남은 연산자 실행 (RESOLVED → RUNNING → DONE | FAILED)
   */
  async run(): Promise<PipelineResult> {
    const start = this.start;
    if (start === null) {
      throw new Error(`illegal pipeline transition ${this.state} -> ${PipelineState.RUNNING}`);
    }
    this.transition(PipelineState.RUNNING);

    const startTime = performance.now();
    const stepTimings = this.options.debug ? new Map<string, number>() : undefined;
    let table: XYTable = start.table;

    try {
      for (let i = start.skip; i < this.steps.length; i++) {
        const step = this.steps[i];
        const stepStart = this.options.debug ? performance.now() : 0;

        if (step.kind === 'transform') {
          table = step.transformer.transform(table);
        } else {
          const result = step.dumper.dump({
            table,
            key: this.keys[i],
            sequence: this.sequences[i],
            lineage: start.lineage,
          });
          if (result instanceof Promise) {
            await result;
          }
        }

        // 타이밍 기록
        if (stepTimings) {
          stepTimings.set(`${i}:${step.operator.canonical}`, performance.now() - stepStart);
        }
        log.debug(`${step.operator.canonical} done`, { rows: table.rowCount });
      }
    } catch (error) {
      this.transition(PipelineState.FAILED);
      throw error;
    }

    this.transition(PipelineState.DONE);

    return {
      table,
      state: this.state,
      resolvedKey: start.resolvedKey,
      skipped: start.skip,
      executed: this.steps.length - start.skip,
      executionTime: performance.now() - startTime,
      stepTimings,
    };
  }

  private transition(next: PipelineState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`illegal pipeline transition ${this.state} -> ${next}`);
    }
    log.debug(`${this.state} -> ${next}`);
    this.state = next;
  }
}
