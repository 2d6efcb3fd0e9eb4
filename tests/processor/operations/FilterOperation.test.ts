/**
 * FilterOperation 테스트
 */

import { describe, it, expect } from 'vitest';
import { FilterOperation, evaluateCondition, filter } from '../../../src/processor/operations';
import { createTableContent, createTextContent } from '../../../src/core/content';
import { CallbackError, ValidationError } from '../../../src/core/errors';
import type { Content, TableContent } from '../../../src/types';
import { generateSalesRows, SALES_KEYS } from '../../fixtures/generateTestData';

function asTable(content: Content): TableContent {
  if (content.type !== 'table') throw new Error(`expected table, got ${content.type}`);
  return content;
}

describe('FilterOperation', () => {
  const table = createTableContent('Sales', generateSalesRows(8), { schema: SALES_KEYS });

  // ===========================================================================
  // 조건자
  // ===========================================================================

  describe('조건자', () => {
    it('조건을 만족하는 행만 순서대로 남김', () => {
      const result = asTable(filter(row => row.region === 'Seoul').apply(table));

      // region은 4개 지역을 순환하므로 id 1, 5
      expect(result.rows.map(r => r.id)).toEqual([1, 5]);
    });

    it('결과가 비어도 스키마 순서 유지', () => {
      const result = asTable(filter(() => false).apply(table));

      expect(result.rows).toEqual([]);
      expect(result.schema.keyOrder).toEqual(SALES_KEYS);
    });

    it('결과는 원본 콘텐츠의 id를 유지', () => {
      const result = filter(() => true).apply(table);
      expect(result.id).toBe(table.id);
    });

    it('결과 행을 수정해도 원본에 영향 없음', () => {
      const result = asTable(filter(() => true).apply(table));
      const [first] = result.rows;
      if (first) first.region = 'changed';

      expect(table.rows[0]?.region).toBe('Seoul');
    });

    it('조건자 예외는 CallbackError', () => {
      const op = filter(() => {
        throw new Error('bad row');
      });
      expect(() => op.apply(table)).toThrow(CallbackError);
    });
  });

  // ===========================================================================
  // 선언적 조건
  // ===========================================================================

  describe('선언적 조건', () => {
    it('여러 조건은 AND로 결합', () => {
      const op = filter([
        { columnKey: 'paid', operator: 'eq', value: true },
        { columnKey: 'amount', operator: 'gte', value: 100 },
      ]);
      const result = asTable(op.apply(table));

      // amount: id1=10, id2=47, id3=84, id4=121, id5=158, id6=195, id7=232, id8=269
      expect(result.rows.map(r => r.id)).toEqual([4, 6, 8]);
    });

    it('문자열 연산자는 대소문자 무시', () => {
      expect(evaluateCondition('Keyboard', 'contains', 'BOARD')).toBe(true);
      expect(evaluateCondition('Keyboard', 'startsWith', 'key')).toBe(true);
      expect(evaluateCondition('Keyboard', 'endsWith', 'KEY')).toBe(false);
      expect(evaluateCondition('Keyboard', 'notContains', 'mouse')).toBe(true);
    });

    it('between은 양 끝 포함', () => {
      expect(evaluateCondition(10, 'between', [10, 20])).toBe(true);
      expect(evaluateCondition(20, 'between', [10, 20])).toBe(true);
      expect(evaluateCondition(21, 'between', [10, 20])).toBe(false);
    });

    it('빈 값은 isNull만 만족', () => {
      expect(evaluateCondition(null, 'isNull')).toBe(true);
      expect(evaluateCondition(undefined, 'isNull')).toBe(true);
      expect(evaluateCondition(null, 'eq', null)).toBe(false);
      expect(evaluateCondition(null, 'isNotNull')).toBe(false);
      expect(evaluateCondition(0, 'isNotNull')).toBe(true);
    });

    it('Date는 시각으로 비교', () => {
      const value = new Date('2024-03-01T00:00:00.000Z');
      expect(evaluateCondition(value, 'eq', new Date('2024-03-01T00:00:00.000Z'))).toBe(true);
    });

    it('숫자 비교 연산자는 타입이 다르면 false', () => {
      expect(evaluateCondition('5', 'gt', 1)).toBe(false);
    });
  });

  // ===========================================================================
  // 검증 / 기타
  // ===========================================================================

  describe('검증', () => {
    it('조건자도 조건도 없으면 실패', () => {
      expect(() => new FilterOperation(undefined).validate()).toThrow(ValidationError);
      expect(() => filter([]).validate()).toThrow('filter requires a predicate or at least one condition');
    });

    it('빈 컬럼 키 조건은 실패', () => {
      expect(() => filter([{ columnKey: '', operator: 'eq', value: 1 }]).validate()).toThrow(ValidationError);
    });

    it('유효한 필터는 통과', () => {
      expect(() => filter(() => true).validate()).not.toThrow();
    });
  });

  it('테이블이 아닌 콘텐츠는 그대로 통과', () => {
    const text = createTextContent('hello');
    expect(filter(() => false).apply(text)).toBe(text);
  });

  it('다른 필터와 병합 가능', () => {
    expect(filter(() => true).canOptimize(filter(() => false))).toBe(true);
  });
});
