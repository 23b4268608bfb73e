/**
 * 프로세서 모듈
 *
 * 구성:
 * - parser/: 연산자 시퀀스 파서
 * - pipeline/: 변환 연산자와 실행 드라이버
 * - cache/: 캐시 저장소와 재사용 지점 결정
 * - dump/: 캐시 기록, 출력, 플롯 덤프
 * - engines/: 관계형 연산과 CSV 입출력 (Arquero)
 * - MultiSeriesRunner: 여러 시리즈를 한 플롯으로
 */

// 파서
export {
  parseOperatorSequence,
  formatSequence,
  formatNumber,
  transformTokens,
  prefixKeys,
  tokenizeKey,
  isTransform,
  isDump,
} from './parser/OperatorParser';
export { OPERATOR_SPECS, OPERATOR_HELP, isOperatorLetter } from './parser/operatorTable';

// 엔진
export * from './engines';

// 파이프라인
export * from './pipeline';

// 캐시
export * from './cache';

// 덤프
export * from './dump';

// 다중 시리즈
export { MultiSeriesRunner } from './MultiSeriesRunner';
export type { MultiSeriesOptions, SeriesResult, MultiSeriesResult } from './MultiSeriesRunner';
