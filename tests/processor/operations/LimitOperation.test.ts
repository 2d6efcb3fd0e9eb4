/**
 * LimitOperation 테스트
 */

import { describe, it, expect } from 'vitest';
import { limit } from '../../../src/processor/operations';
import { createTableContent } from '../../../src/core/content';
import { ValidationError } from '../../../src/core/errors';
import type { Content } from '../../../src/types';
import { generateSalesRows, SALES_KEYS } from '../../fixtures/generateTestData';

function rowCount(content: Content): number {
  return content.type === 'table' ? content.rows.length : -1;
}

describe('LimitOperation', () => {
  const table = createTableContent('Sales', generateSalesRows(5), { schema: SALES_KEYS });

  it('결과 길이는 min(n, 입력 길이)', () => {
    expect(rowCount(limit(3).apply(table))).toBe(3);
    expect(rowCount(limit(5).apply(table))).toBe(5);
    expect(rowCount(limit(50).apply(table))).toBe(5);
  });

  it('limit(0)은 행이 없음', () => {
    expect(rowCount(limit(0).apply(table))).toBe(0);
  });

  it('앞쪽 행을 유지', () => {
    const result = limit(2).apply(table);
    expect(result.type === 'table' && result.rows.map(r => r.id)).toEqual([1, 2]);
  });

  it('음수나 정수가 아닌 값은 검증 실패', () => {
    expect(() => limit(-1).validate()).toThrow(ValidationError);
    expect(() => limit(1.5).validate()).toThrow('limit must be a non-negative integer');
    expect(() => limit(0).validate()).not.toThrow();
  });
});
