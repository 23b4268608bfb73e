/**
 * 엔진 모듈 export
 */

// 인터페이스 및 타입
export type { IEngine, RawSheet } from './IEngine';

// 엔진 구현체
export { ArqueroEngine, parseNumberCell, quoteCell } from './ArqueroEngine';
