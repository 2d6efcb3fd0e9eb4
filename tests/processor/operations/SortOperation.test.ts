/**
 * SortOperation 테스트
 */

import { describe, it, expect } from 'vitest';
import { SortOperation, compareValues, sortBy } from '../../../src/processor/operations';
import { createTableContent } from '../../../src/core/content';
import { CallbackError, ValidationError } from '../../../src/core/errors';
import type { CellValue, Content, TableContent } from '../../../src/types';

function asTable(content: Content): TableContent {
  if (content.type !== 'table') throw new Error(`expected table, got ${content.type}`);
  return content;
}

describe('SortOperation', () => {
  const table = createTableContent(
    'Scores',
    [
      { name: 'a', team: 'red', score: 3 },
      { name: 'b', team: 'blue', score: 1 },
      { name: 'c', team: 'red', score: 1 },
      { name: 'd', team: 'blue', score: 3 },
      { name: 'e', team: 'red', score: 2 },
    ],
    { schema: ['name', 'team', 'score'] }
  );

  // ===========================================================================
  // 정렬
  // ===========================================================================

  describe('정렬', () => {
    it('같은 키의 행은 원래 순서 유지 (안정 정렬)', () => {
      const result = asTable(sortBy({ columnKey: 'score', direction: 'asc' }).apply(table));
      expect(result.rows.map(r => r.name)).toEqual(['b', 'c', 'e', 'a', 'd']);
    });

    it('내림차순도 안정 정렬', () => {
      const result = asTable(sortBy({ columnKey: 'score', direction: 'desc' }).apply(table));
      expect(result.rows.map(r => r.name)).toEqual(['a', 'd', 'e', 'b', 'c']);
    });

    it('다중 키는 앞 키가 우선', () => {
      const result = asTable(
        sortBy({ columnKey: 'team', direction: 'asc' }, { columnKey: 'score', direction: 'desc' }).apply(table)
      );
      expect(result.rows.map(r => r.name)).toEqual(['d', 'b', 'a', 'e', 'c']);
    });

    it('고유 값에서 오름차순 결과를 뒤집으면 내림차순 결과', () => {
      const asc = asTable(sortBy({ columnKey: 'name', direction: 'asc' }).apply(table));
      const desc = asTable(sortBy({ columnKey: 'name', direction: 'desc' }).apply(table));

      expect(desc.rows.map(r => r.name)).toEqual([...asc.rows.map(r => r.name)].reverse());
    });

    it('스키마 순서는 유지', () => {
      const result = asTable(sortBy({ columnKey: 'score', direction: 'asc' }).apply(table));
      expect(result.schema.keyOrder).toEqual(['name', 'team', 'score']);
    });

    it('커스텀 비교 함수', () => {
      const result = asTable(sortBy((a, b) => String(b.name).localeCompare(String(a.name))).apply(table));
      expect(result.rows.map(r => r.name)).toEqual(['e', 'd', 'c', 'b', 'a']);
    });

    it('비교 함수 예외는 CallbackError', () => {
      const op = sortBy(() => {
        throw new Error('cannot compare');
      });
      expect(() => op.apply(table)).toThrow(CallbackError);
    });

    it('원본 행 순서는 변하지 않음', () => {
      sortBy({ columnKey: 'score', direction: 'asc' }).apply(table);
      expect(table.rows.map(r => r.name)).toEqual(['a', 'b', 'c', 'd', 'e']);
    });
  });

  // ===========================================================================
  // 오류
  // ===========================================================================

  describe('오류', () => {
    it('키가 없으면 검증 실패', () => {
      expect(() => new SortOperation([]).validate()).toThrow('sort requires at least one key');
    });

    it('빈 컬럼 이름은 검증 실패', () => {
      expect(() => sortBy({ columnKey: '', direction: 'asc' }).validate()).toThrow(ValidationError);
    });

    it('스키마에 없는 컬럼은 실행 실패', () => {
      const op = sortBy({ columnKey: 'missing', direction: 'asc' });
      expect(() => op.validate()).not.toThrow();
      expect(() => op.apply(table)).toThrow('column "missing" not found in schema');
    });
  });

  // ===========================================================================
  // 값 비교
  // ===========================================================================

  describe('compareValues', () => {
    it('null / undefined가 가장 앞', () => {
      expect([3, null, 1].sort(compareValues)).toEqual([null, 1, 3]);
      expect(compareValues(undefined, 1)).toBeLessThan(0);
      expect(compareValues(null, undefined)).toBe(0);
    });

    it('문자열은 코드 유닛 순서', () => {
      expect(['b', 'B', 'a'].sort(compareValues)).toEqual(['B', 'a', 'b']);
    });

    it('불리언은 false < true, 날짜는 시각 순', () => {
      expect(compareValues(false, true)).toBeLessThan(0);
      expect(compareValues(new Date(2000, 0, 1), new Date(1999, 0, 1))).toBeGreaterThan(0);
    });

    it('NaN은 다른 숫자보다 뒤', () => {
      expect([NaN, 2, 1].sort(compareValues)).toEqual([1, 2, NaN]);
    });

    it('타입이 다르면 타입 순위로 비교 (숫자 < 문자열 < 불리언 < 날짜)', () => {
      expect(compareValues(10, 'a')).toBeLessThan(0);
      expect(compareValues('10a', 9)).toBeGreaterThan(0);
      expect(compareValues(true, 2)).toBeGreaterThan(0);
      expect(compareValues(new Date(0), true)).toBeGreaterThan(0);
    });

    it('섞인 타입도 입력 순서와 무관하게 같은 결과', () => {
      const orders: CellValue[][] = [
        [9, 10, '10a', true, null],
        ['10a', null, 9, true, 10],
        [true, 10, '10a', 9, null],
      ];
      const expected = [null, 9, 10, '10a', true];

      for (const values of orders) {
        expect([...values].sort(compareValues)).toEqual(expected);
      }
    });

    it('섞인 타입 컬럼에서도 내림차순은 오름차순의 역순', () => {
      const table = createTableContent('t', [{ v: '10a' }, { v: 9 }, { v: 10 }, { v: 'b' }]);
      const asc = sortBy({ columnKey: 'v', direction: 'asc' }).apply(table);
      const desc = sortBy({ columnKey: 'v', direction: 'desc' }).apply(table);

      const ascValues = asc.type === 'table' ? asc.rows.map(r => r.v) : [];
      const descValues = desc.type === 'table' ? desc.rows.map(r => r.v) : [];
      expect(ascValues).toEqual([9, 10, '10a', 'b']);
      expect(descValues).toEqual([...ascValues].reverse());
    });
  });
});
