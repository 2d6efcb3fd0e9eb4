/**
 * FilterOperation - 필터 연산
 *
 * 조건자(predicate) 또는 선언적 조건 목록을 만족하는 행만 남깁니다.
 * 스키마와 키 순서는 결과가 비어 있어도 그대로 유지됩니다.
 * 테이블이 아닌 콘텐츠는 변경 없이 통과시킵니다.
 *
 * @example
 * filter(row => Number(row.amount) > 100);
 * filter([{ columnKey: 'region', operator: 'eq', value: 'Seoul' }]);
 */

import type {
  CellValue,
  Content,
  FilterCondition,
  FilterOperator,
  Operation,
  Row,
  RowPredicate,
} from '../../types';
import { ValidationError, invokeCallback } from '../../core/errors';
import { copyRow, deriveTable, isTableContent } from '../../core/content';

/**
 * 지원하는 필터 연산자
 */
export const FILTER_OPERATORS: readonly FilterOperator[] = [
  'eq', 'neq', 'gt', 'gte', 'lt', 'lte',
  'contains', 'notContains', 'startsWith', 'endsWith',
  'between', 'isNull', 'isNotNull',
];

// =============================================================================
// FilterOperation 클래스
// =============================================================================

export class FilterOperation implements Operation {
  readonly name = 'filter';

  /** 조건자 */
  private readonly predicate?: RowPredicate;

  /** 선언적 조건 (AND 조합) */
  private readonly conditions: readonly FilterCondition[];

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(criteria: RowPredicate | readonly FilterCondition[] | undefined) {
    if (typeof criteria === 'function') {
      this.predicate = criteria;
      this.conditions = [];
    } else {
      this.conditions = Object.freeze((criteria ?? []).map(condition => ({ ...condition })));
    }
  }

  // ==========================================================================
  // Operation 구현
  // ==========================================================================

  validate(): void {
    if (!this.predicate && this.conditions.length === 0) {
      throw new ValidationError('predicate', undefined, 'filter requires a predicate or at least one condition');
    }

    this.conditions.forEach((condition, i) => {
      if (condition.columnKey === '') {
        throw new ValidationError(`conditions[${i}].columnKey`, condition.columnKey, 'column key must not be empty');
      }
      if (!FILTER_OPERATORS.includes(condition.operator)) {
        throw new ValidationError(`conditions[${i}].operator`, condition.operator, 'unknown operator');
      }
    });
  }

  apply(content: Content): Content {
    if (!isTableContent(content)) {
      return content;
    }

    const rows: Row[] = [];
    for (const row of content.rows) {
      if (this.matches(row)) {
        rows.push(copyRow(row));
      }
    }

    return deriveTable(content, { rows });
  }

  /**
   * 인접한 필터끼리는 하나의 조건으로 합칠 수 있음
   */
  canOptimize(other: Operation): boolean {
    return other instanceof FilterOperation;
  }

  // ==========================================================================
  // 필터 로직
  // ==========================================================================

  /**
   * 행이 조건을 만족하는지 확인
   */
  private matches(row: Row): boolean {
    const { predicate } = this;
    if (predicate) {
      return invokeCallback('predicate', () => predicate(row));
    }

    // AND 조합: 모든 조건을 만족해야 함
    return this.conditions.every(condition =>
      evaluateCondition(row[condition.columnKey], condition.operator, condition.value)
    );
  }
}

// =============================================================================
// 조건 평가
// =============================================================================

/**
 * 필터 조건 평가
 */
export function evaluateCondition(
  value: CellValue,
  operator: FilterOperator,
  filterValue?: FilterCondition['value']
): boolean {
  // null/undefined 처리
  if (value === null || value === undefined) {
    return operator === 'isNull';
  }

  switch (operator) {
    case 'eq':
      return isEqual(value, filterValue);

    case 'neq':
      return !isEqual(value, filterValue);

    case 'gt':
      return typeof value === 'number' && typeof filterValue === 'number' && value > filterValue;

    case 'gte':
      return typeof value === 'number' && typeof filterValue === 'number' && value >= filterValue;

    case 'lt':
      return typeof value === 'number' && typeof filterValue === 'number' && value < filterValue;

    case 'lte':
      return typeof value === 'number' && typeof filterValue === 'number' && value <= filterValue;

    case 'contains':
      return typeof value === 'string' &&
             typeof filterValue === 'string' &&
             value.toLowerCase().includes(filterValue.toLowerCase());

    case 'notContains':
      return typeof value === 'string' &&
             typeof filterValue === 'string' &&
             !value.toLowerCase().includes(filterValue.toLowerCase());

    case 'startsWith':
      return typeof value === 'string' &&
             typeof filterValue === 'string' &&
             value.toLowerCase().startsWith(filterValue.toLowerCase());

    case 'endsWith':
      return typeof value === 'string' &&
             typeof filterValue === 'string' &&
             value.toLowerCase().endsWith(filterValue.toLowerCase());

    case 'between':
      if (Array.isArray(filterValue)) {
        const [min, max] = filterValue;
        return typeof value === 'number' && value >= min && value <= max;
      }
      return false;

    case 'isNull':
      return false;

    case 'isNotNull':
      return true;

    default:
      console.warn(`FilterOperation: Unknown operator "${String(operator)}"`);
      return false;
  }
}

/**
 * 동등 비교 (Date는 시각으로 비교)
 */
function isEqual(value: CellValue, filterValue: FilterCondition['value']): boolean {
  if (value instanceof Date && filterValue instanceof Date) {
    return value.getTime() === filterValue.getTime();
  }
  return value === filterValue;
}
