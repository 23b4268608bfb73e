/**
 * 타입 정의 모듈
 *
 * 모든 모듈에서 공유하는 타입들을 정의합니다.
 * 이 파일에서 모든 타입을 한 번에 import할 수 있습니다.
 *
 * @example
 * import type { XYRow, Operator, CacheEntryMeta } from '../types';
 */

// 데이터 타입
export type { XYRow, ColumnNames, ColumnSelector } from './data.types';

// 연산자 타입
export type {
  WindowedTransformLetter,
  PlainTransformLetter,
  TransformLetter,
  DumpLetter,
  OperatorLetter,
  XWindow,
  WindowedTransformOperator,
  PlainTransformOperator,
  TransformOperator,
  DumpOperator,
  Operator,
  OperatorSpec,
} from './operator.types';

// 캐시 타입
export type {
  LineageRecord,
  LineageRef,
  CacheEntryMeta,
  CacheResolution,
} from './cache.types';

// 플롯 타입
export type {
  PlotType,
  AxisPair,
  AxisId,
  AxisRange,
  AxisTics,
  PlotSize,
  SeriesOptions,
  PlotTemplateOptions,
  PlotAppearance,
  SeriesSpec,
} from './plot.types';
