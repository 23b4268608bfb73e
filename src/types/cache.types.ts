/**
 * 캐시 / 계보(lineage) 타입 정의
 */

import type { ColumnNames } from './data.types';

// ============================================================================
// 계보
// ============================================================================

/**
 * 계보 레코드
 *
 * 캐시 엔트리가 어떤 원본에서 어떤 축 선택으로 만들어졌는지 기록합니다.
 * 출력 디렉터리마다 첫 캐시 기록 때 한 번 쓰입니다.
 */
export interface LineageRecord {
  /** 원본 파일의 절대 경로 */
  readonly source: string;

  /** 원본 첫 줄이 헤더인지 여부 */
  readonly hasHeader: boolean;

  /** x 축 선택자 원문 (`$1`, `$price`, ...) */
  readonly x: string;

  /** y 축 선택자 원문 */
  readonly y: string;
}

/**
 * 계보 참조 (레코드 + 식별자)
 */
export interface LineageRef {
  /** 레코드의 정규 JSON에 대한 SHA-256 */
  readonly id: string;

  readonly record: LineageRecord;
}

// ============================================================================
// 캐시 엔트리
// ============================================================================

/**
 * 캐시 엔트리 메타데이터
 *
 * 테이블 본문 없이 목록/해석에 필요한 정보만 담습니다.
 */
export interface CacheEntryMeta {
  /** 덤프 문자를 뺀 정규 연산자 프리픽스 */
  readonly key: string;

  /** 저장소 안에서 단조 증가하는 기록 순번 */
  readonly sequence: number;

  /** 기록 시각 (ISO 8601) */
  readonly writtenAt: string;

  /** 계보 식별자 */
  readonly lineageId: string;

  /** 저장된 테이블의 컬럼 이름 */
  readonly names: ColumnNames;

  /** 저장된 테이블의 행 수 */
  readonly rowCount: number;
}

/**
 * 캐시 해석 결과
 */
export interface CacheResolution {
  /** 재사용할 엔트리 */
  readonly entry: CacheEntryMeta;

  /** 요청 시퀀스에서 건너뛸 연산자 수 (덤프 포함) */
  readonly skip: number;
}
