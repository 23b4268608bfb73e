/**
 * TransformerFactory - 연산자 → 실행 단계 생성
 *
 * 연산자 알파벳은 닫힌 유니온이므로 switch 가 모든 문자를 다룹니다.
 * 문자를 추가하면 여기서 컴파일 에러가 납니다.
 */

import type { DumpLetter, DumpOperator, Operator, TransformOperator } from '../../types';
import type { IEngine } from '../engines/IEngine';
import { ArqueroEngine } from '../engines/ArqueroEngine';
import type { Dumper, PipelineStep, Transformer } from './Transformer';
import { AverageTransformer } from './AverageTransformer';
import { CdfTransformer } from './CdfTransformer';
import { DerivativeTransformer } from './DerivativeTransformer';
import { FilterTransformer } from './FilterTransformer';
import { IntegralTransformer } from './IntegralTransformer';
import { MergeTransformer } from './MergeTransformer';
import { RotateTransformer } from './RotateTransformer';
import { SortTransformer } from './SortTransformer';
import { StepTransformer } from './StepTransformer';
import { UniqueTransformer } from './UniqueTransformer';

// =============================================================================
// 팩토리 인터페이스
// =============================================================================

/**
 * 실행 단계 생성 팩토리
 *
 * 덤프는 외부 협력자(저장소, 출력, 렌더러)가 필요하므로 호출자가 공급합니다.
 */
export interface StepFactory {
  createTransformer(operator: TransformOperator): Transformer;

  createDumper(operator: DumpOperator): Dumper;
}

/**
 * 연산자 하나를 실행 단계로
 */
export function createStep(operator: Operator, factory: StepFactory): PipelineStep {
  if (operator.kind === 'transform') {
    return { kind: 'transform', operator, transformer: factory.createTransformer(operator) };
  }
  return { kind: 'dump', operator, dumper: factory.createDumper(operator) };
}

// =============================================================================
// 기본 팩토리
// =============================================================================

export interface TransformerFactoryOptions {
  /** 덤프 문자별 실행기 (없는 문자는 쓸 수 없음) */
  dumpers: Readonly<Partial<Record<DumpLetter, Dumper>>>;

  /** 관계형 연산 엔진 (기본: Arquero) */
  engine?: IEngine;
}

export class TransformerFactory implements StepFactory {
  private readonly dumpers: Readonly<Partial<Record<DumpLetter, Dumper>>>;

  private readonly engine: IEngine;

  constructor(options: TransformerFactoryOptions) {
    this.dumpers = options.dumpers;
    this.engine = options.engine ?? new ArqueroEngine();
  }

  createTransformer(operator: TransformOperator): Transformer {
    switch (operator.letter) {
      case 'a':
        return new AverageTransformer(operator.window);
      case 'c':
        return new CdfTransformer();
      case 'd':
        return new DerivativeTransformer(operator.window);
      case 'f':
        return new FilterTransformer(this.engine);
      case 'i':
        return new IntegralTransformer();
      case 'm':
        return new MergeTransformer();
      case 'o':
        return new SortTransformer();
      case 'r':
        return new RotateTransformer();
      case 's':
        return new StepTransformer();
      case 'u':
        return new UniqueTransformer(this.engine);
    }
  }

  /**
   * @throws RangeError 해당 덤프가 구성되지 않았을 때
   */
  createDumper(operator: DumpOperator): Dumper {
    const dumper = this.dumpers[operator.letter];
    if (!dumper) {
      throw new RangeError(`dump operator '${operator.letter}' is not available here`);
    }
    return dumper;
  }
}
