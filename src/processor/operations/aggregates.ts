/**
 * 집계 함수
 *
 * GroupBy 연산이 그룹별 값을 계산할 때 사용합니다.
 *
 * 수치 집계(sum, avg, min, max)는 유한한 숫자만 대상으로 합니다.
 * 문자열, 불리언, NaN, Infinity, 빈 값은 무시됩니다.
 * 대상 값이 하나도 없으면 sum은 0, 나머지는 null입니다.
 */

import type { AggregateFn, AggregateType, CellValue, Row } from '../../types';
import { invokeCallback } from '../../core/errors';
import { isNullish } from './compare';

/**
 * 내장 집계 함수 이름 목록
 */
export const AGGREGATE_TYPES: readonly AggregateType[] = ['count', 'sum', 'avg', 'min', 'max', 'first', 'last'];

/**
 * 내장 집계 함수 이름인지 확인
 */
export function isAggregateType(value: unknown): value is AggregateType {
  return typeof value === 'string' && AGGREGATE_TYPES.some(type => type === value);
}

function finiteNumbers(values: CellValue[]): number[] {
  return values.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
}

/**
 * 집계 함수 적용
 */
export function applyAggregateFunction(values: CellValue[], func: AggregateType): CellValue {
  const validValues = values.filter(v => !isNullish(v));
  const numbers = finiteNumbers(validValues);

  switch (func) {
    case 'sum':
      return numbers.reduce((a, b) => a + b, 0);

    case 'avg':
      return numbers.length > 0
        ? numbers.reduce((a, b) => a + b, 0) / numbers.length
        : null;

    case 'min':
      return numbers.length > 0 ? numbers.reduce((a, b) => (b < a ? b : a)) : null;

    case 'max':
      return numbers.length > 0 ? numbers.reduce((a, b) => (b > a ? b : a)) : null;

    case 'count':
      return validValues.length;

    case 'first':
      return validValues[0] ?? null;

    case 'last':
      return validValues[validValues.length - 1] ?? null;
  }
}

/**
 * 그룹 행에 집계 실행
 *
 * columnKey 없는 count는 행 수를 반환합니다.
 * 커스텀 함수의 예외는 CallbackError로 변환됩니다.
 */
export function computeAggregate(rows: readonly Row[], aggregate: AggregateFn): CellValue {
  if (typeof aggregate === 'function') {
    return invokeCallback('aggregate', () => aggregate(rows));
  }

  const { columnKey } = aggregate;
  if (columnKey === undefined) {
    return aggregate.function === 'count' ? rows.length : null;
  }

  return applyAggregateFunction(
    rows.map(row => row[columnKey]),
    aggregate.function
  );
}
