/**
 * Pipeline 모듈 진입점
 *
 * 실행 드라이버, 캐시 재사용 실행기, 변환 연산자를 내보냅니다.
 */

// 핵심 클래스
export { DataPipeline } from './DataPipeline';
export { CachedPipeline } from './CachedPipeline';
export type { PipelineSource, CachedPipelineOptions, CacheStats } from './CachedPipeline';
export { TransformerFactory, createStep } from './TransformerFactory';
export type { StepFactory, TransformerFactoryOptions } from './TransformerFactory';

// Transformer 구현
export { AverageTransformer } from './AverageTransformer';
export { CdfTransformer } from './CdfTransformer';
export { DerivativeTransformer } from './DerivativeTransformer';
export { FilterTransformer } from './FilterTransformer';
export { IntegralTransformer } from './IntegralTransformer';
export { MergeTransformer } from './MergeTransformer';
export { RotateTransformer } from './RotateTransformer';
export { SortTransformer } from './SortTransformer';
export { StepTransformer } from './StepTransformer';
export { UniqueTransformer } from './UniqueTransformer';

// 타입 및 헬퍼
export { PipelineState, sortedIndicesByX, assertUniqueSortedX, assertFinite } from './Transformer';
export type {
  Transformer,
  Dumper,
  DumpContext,
  PipelineStep,
  PipelineResult,
  PipelineOptions,
  PipelineStart,
} from './Transformer';
