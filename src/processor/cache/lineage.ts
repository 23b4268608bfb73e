/**
 * 계보(lineage) 헬퍼
 *
 * 계보 식별자는 레코드의 정규 JSON(키 정렬, 공백 없음)에 대한 SHA-256 입니다.
 * 같은 원본 파일과 같은 축 선택이면 언제 만들어도 같은 식별자가 나옵니다.
 */

import { createHash } from 'node:crypto';
import type { LineageRecord, LineageRef } from '../../types';
import { ExternalCollaboratorError } from '../../core/errors';

/**
 * 정규 JSON 표현
 */
export function canonicalLineageJson(record: LineageRecord): string {
  return JSON.stringify({
    hasHeader: record.hasHeader,
    source: record.source,
    x: record.x,
    y: record.y,
  });
}

/**
 * 레코드로 계보 참조 생성
 */
export function createLineage(record: LineageRecord): LineageRef {
  const normalized: LineageRecord = {
    source: record.source,
    hasHeader: record.hasHeader,
    x: record.x,
    y: record.y,
  };
  const id = createHash('sha256').update(canonicalLineageJson(normalized)).digest('hex');
  return { id, record: normalized };
}

/**
 * lineage.json 본문 해석
 *
 * 저장된 id 는 믿지 않고 레코드에서 다시 계산합니다.
 *
 * @throws ExternalCollaboratorError 필드가 빠졌거나 형식이 틀릴 때
 */
export function parseLineage(text: string, location: string): LineageRef {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ExternalCollaboratorError('cache store', `${location} is not valid JSON`, error);
  }

  const container = isRecord(raw) ? raw['record'] : undefined;
  const record: Record<string, unknown> = isRecord(container) ? container : {};
  const { source, hasHeader, x, y } = record;
  if (
    typeof source !== 'string' ||
    typeof hasHeader !== 'boolean' ||
    typeof x !== 'string' ||
    typeof y !== 'string'
  ) {
    throw new ExternalCollaboratorError('cache store', `${location} is not a lineage record`);
  }

  return createLineage({ source, hasHeader, x, y });
}

/**
 * lineage.json 본문 생성
 */
export function formatLineage(lineage: LineageRef): string {
  return `${JSON.stringify({ id: lineage.id, record: lineage.record }, null, 2)}\n`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
