/**
 * seqplot - 연산자 시퀀스 기반 2컬럼 데이터 변환/플롯 도구
 *
 * 짧은 연산자 문자열(`iCd1000CcP`)로 x/y 테이블을 변환하고,
 * 이전 실행이 캐시해 둔 가장 긴 프리픽스부터 이어서 실행합니다.
 */

// 타입 내보내기
export * from './types';

// 코어 모듈 내보내기
export * from './core';

// 프로세서 모듈 내보내기
export * from './processor';

// 원본 읽기
export { SourceReader, parseSelector, STDIN_INPUT } from './source/SourceReader';
export type { SourceRequest, SourceReaderOptions } from './source/SourceReader';

// 렌더링
export { buildPlotScript, seriesLine, DEFAULT_TERMINAL, DEFAULT_KEY_POSITION } from './render/GnuplotTemplate';
export { GnuplotRenderer } from './render/GnuplotRenderer';
export type { Renderer } from './render/GnuplotRenderer';

// CLI
export { runSeqplot, parseSeqplotArgs, withImpliedDump, SEQPLOT_USAGE } from './cli/seqplot';
export { runSeqplotMulti, parseSeriesSpec, expandSeriesKey, SEQPLOT_MULTI_USAGE } from './cli/seqplotMulti';
export type { CliIO } from './cli/io';
