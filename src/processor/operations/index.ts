/**
 * 내장 연산 모듈
 *
 * 콘텐츠 생성 시 operations 옵션에 넘길 연산들을 만듭니다.
 *
 * @example
 * import { filter, sortBy, limit } from './processor/operations';
 *
 * createTableContent('Top 5', rows, {
 *   operations: [filter(r => r.active === true), sortBy({ columnKey: 'score', direction: 'desc' }), limit(5)],
 * });
 */

import type {
  AggregateFn,
  DeriveFunction,
  FieldType,
  FilterCondition,
  RowComparator,
  RowPredicate,
  SortKey,
} from '../../types';
import { FilterOperation } from './FilterOperation';
import { SortOperation } from './SortOperation';
import { LimitOperation } from './LimitOperation';
import { GroupByOperation } from './GroupByOperation';
import { AddColumnOperation } from './AddColumnOperation';

export { FilterOperation, evaluateCondition, FILTER_OPERATORS } from './FilterOperation';
export { SortOperation } from './SortOperation';
export { LimitOperation } from './LimitOperation';
export { GroupByOperation } from './GroupByOperation';
export { AddColumnOperation } from './AddColumnOperation';
export { compareValues, isNullish } from './compare';
export { applyAggregateFunction, computeAggregate, AGGREGATE_TYPES } from './aggregates';

// =============================================================================
// 팩토리
// =============================================================================

/**
 * 필터 연산 생성
 */
export function filter(criteria: RowPredicate | readonly FilterCondition[]): FilterOperation {
  return new FilterOperation(criteria);
}

/**
 * 정렬 연산 생성 (키 목록 또는 비교 함수)
 */
export function sortBy(...keys: SortKey[]): SortOperation;
export function sortBy(comparator: RowComparator): SortOperation;
export function sortBy(...args: Array<SortKey | RowComparator>): SortOperation {
  const [first] = args;
  if (typeof first === 'function') {
    return new SortOperation(first);
  }
  return new SortOperation(args.filter((arg): arg is SortKey => typeof arg !== 'function'));
}

/**
 * 개수 제한 연산 생성
 */
export function limit(count: number): LimitOperation {
  return new LimitOperation(count);
}

/**
 * 그룹화 연산 생성
 */
export function groupBy(columns: readonly string[], aggregates: Record<string, AggregateFn> = {}): GroupByOperation {
  return new GroupByOperation(columns, aggregates);
}

/**
 * 파생 컬럼 연산 생성
 */
export function addColumn(
  name: string,
  fn: DeriveFunction,
  position?: number,
  type?: FieldType
): AddColumnOperation {
  return new AddColumnOperation(name, fn, position, type);
}
