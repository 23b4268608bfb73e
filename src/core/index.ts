/**
 * 코어 모듈
 *
 * 테이블 값 객체, 에러, 로거, 실행 설정입니다.
 */

// 테이블
export { XYTable } from './XYTable';

// 에러
export {
  PipelineError,
  ParseError,
  NonFiniteValueError,
  DuplicateKeyError,
  LineageMismatchError,
  CacheWriteRefusedError,
  ExternalCollaboratorError,
  SourceError,
  describeError,
} from './errors';
export type { PipelineErrorCode } from './errors';

// 로거
export { logger, createLogger, isLogLevel } from './logger';
export type { LogLevel, ScopedLogger } from './logger';

// 설정
export {
  DEFAULT_RUN_CONFIG,
  RUN_MODES,
  INPUT_FORMATS,
  configFromEnv,
  resolveRunConfig,
  isRunMode,
  isInputFormat,
} from './config';
export type { RunConfig, RunMode, InputFormat } from './config';
