/**
 * 계보 헬퍼 테스트
 */

import { describe, it, expect } from 'vitest';
import { ExternalCollaboratorError } from '../../../src/core/errors';
import {
  canonicalLineageJson,
  createLineage,
  formatLineage,
  parseLineage,
} from '../../../src/processor/cache/lineage';

const RECORD = { source: '/data/a.csv', hasHeader: false, x: '$1', y: '$2' };

describe('lineage', () => {
  it('정규 JSON 은 키 정렬, 공백 없음', () => {
    expect(canonicalLineageJson(RECORD)).toBe('{"hasHeader":false,"source":"/data/a.csv","x":"$1","y":"$2"}');
  });

  it('같은 레코드는 같은 식별자', () => {
    const a = createLineage(RECORD);
    const b = createLineage({ y: '$2', x: '$1', hasHeader: false, source: '/data/a.csv' });

    expect(a.id).toBe(b.id);
    expect(a.id).toMatch(/^[0-9a-f]{64}$/);
  });

  it('축 선택이 다르면 다른 식별자', () => {
    expect(createLineage(RECORD).id).not.toBe(createLineage({ ...RECORD, y: '$3' }).id);
    expect(createLineage(RECORD).id).not.toBe(createLineage({ ...RECORD, hasHeader: true }).id);
  });

  it('lineage.json 왕복', () => {
    const lineage = createLineage(RECORD);
    expect(parseLineage(formatLineage(lineage), 'lineage.json')).toEqual(lineage);
  });

  it('저장된 id 는 레코드에서 다시 계산', () => {
    const text = JSON.stringify({ id: 'tampered', record: RECORD });
    expect(parseLineage(text, 'lineage.json').id).toBe(createLineage(RECORD).id);
  });

  it('깨진 파일은 ExternalCollaboratorError', () => {
    expect(() => parseLineage('{', 'lineage.json')).toThrow(ExternalCollaboratorError);
    expect(() => parseLineage('{', 'lineage.json')).toThrow('cache store: lineage.json is not valid JSON');
    expect(() => parseLineage('{"record":{"source":1}}', 'lineage.json')).toThrow(
      'cache store: lineage.json is not a lineage record'
    );
    expect(() => parseLineage('[]', 'lineage.json')).toThrow('is not a lineage record');
  });
});
