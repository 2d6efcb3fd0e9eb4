/**
 * GroupByOperation - 그룹화 + 집계
 *
 * 그룹 컬럼 값의 조합(튜플)이 같은 행끼리 묶고, 그룹마다 한 행을 만듭니다.
 * 그룹은 키 튜플이 처음 등장한 순서대로 출력됩니다.
 *
 * 출력 스키마: 그룹 컬럼(지정 순서) + 집계 이름(삽입 순서)
 *
 * 그룹 키 동등성:
 * - null과 undefined는 같은 그룹
 * - 숫자 1과 문자열 '1'은 다른 그룹
 * - Date는 시각이 같으면 같은 그룹
 * - NaN끼리는 같은 그룹
 *
 * @example
 * groupBy(['region'], {
 *   orders: { function: 'count' },
 *   total: { function: 'sum', columnKey: 'amount' },
 * });
 */

import type { AggregateFn, CellValue, Content, FieldDef, Operation, Row } from '../../types';
import { ValidationError } from '../../core/errors';
import { copyValue, deriveTable, isTableContent } from '../../core/content';
import { Schema } from '../../core/Schema';
import { computeAggregate, isAggregateType } from './aggregates';

// =============================================================================
// 타입
// =============================================================================

/**
 * 그룹 (첫 행의 그룹 값 + 소속 행)
 */
interface Group {
  values: CellValue[];
  rows: Row[];
}

// =============================================================================
// GroupByOperation 클래스
// =============================================================================

export class GroupByOperation implements Operation {
  readonly name = 'groupBy';

  /** 그룹 컬럼 */
  private readonly columns: readonly string[];

  /** 집계 이름 → 집계 함수 (삽입 순서 유지) */
  private readonly aggregates: ReadonlyMap<string, AggregateFn>;

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(columns: readonly string[], aggregates: Readonly<Record<string, AggregateFn>> = {}) {
    this.columns = Object.freeze([...columns]);
    this.aggregates = new Map(Object.entries(aggregates));
  }

  // ==========================================================================
  // Operation 구현
  // ==========================================================================

  validate(): void {
    if (this.columns.length === 0) {
      throw new ValidationError('columns', this.columns, 'groupBy requires at least one column');
    }

    const seen = new Set<string>();
    for (const column of this.columns) {
      if (column === '') {
        throw new ValidationError('columns', column, 'column name must not be empty');
      }
      if (seen.has(column)) {
        throw new ValidationError('columns', column, `duplicate group column "${column}"`);
      }
      seen.add(column);
    }

    for (const [name, aggregate] of this.aggregates) {
      if (name === '') {
        throw new ValidationError('aggregates', name, 'aggregate name must not be empty');
      }
      if (typeof aggregate === 'function') continue;

      if (!isAggregateType(aggregate.function)) {
        throw new ValidationError(`aggregates.${name}`, aggregate.function, 'unknown aggregate function');
      }
      if (aggregate.columnKey === undefined && aggregate.function !== 'count') {
        throw new ValidationError(`aggregates.${name}`, aggregate, `${aggregate.function} requires a column`);
      }
    }
  }

  apply(content: Content): Content {
    if (!isTableContent(content)) {
      return content;
    }

    const { schema } = content;
    for (const column of this.columns) {
      if (!schema.hasField(column)) {
        throw new ValidationError('columns', column, `column "${column}" not found in schema`);
      }
    }
    for (const [name, aggregate] of this.aggregates) {
      if (this.columns.includes(name)) {
        throw new ValidationError('aggregates', name, `aggregate "${name}" collides with a group column`);
      }
      if (typeof aggregate !== 'function' && aggregate.columnKey !== undefined && !schema.hasField(aggregate.columnKey)) {
        throw new ValidationError(`aggregates.${name}`, aggregate.columnKey, `column "${aggregate.columnKey}" not found in schema`);
      }
    }

    const groups = this.partition(content.rows);

    const rows: Row[] = [];
    for (const group of groups.values()) {
      const row: Row = {};
      this.columns.forEach((column, i) => {
        row[column] = copyValue(group.values[i]);
      });
      for (const [name, aggregate] of this.aggregates) {
        row[name] = computeAggregate(group.rows, aggregate);
      }
      rows.push(row);
    }

    return deriveTable(content, { schema: this.buildSchema(schema), rows });
  }

  canOptimize(): boolean {
    return false;
  }

  // ==========================================================================
  // 그룹화 로직
  // ==========================================================================

  /**
   * 행을 그룹 키별로 분할 (Map은 삽입 순서를 유지)
   */
  private partition(rows: readonly Row[]): Map<string, Group> {
    const groups = new Map<string, Group>();

    for (const row of rows) {
      const values = this.columns.map(column => row[column]);
      const key = JSON.stringify(values.map(encodeKeyPart));

      const group = groups.get(key);
      if (group) {
        group.rows.push(row);
      } else {
        groups.set(key, { values, rows: [row] });
      }
    }

    return groups;
  }

  /**
   * 출력 스키마 (그룹 컬럼의 필드 정의는 유지)
   */
  private buildSchema(input: Schema): Schema {
    const fields: FieldDef[] = this.columns.map(column => ({ ...input.findField(column), name: column, hidden: false }));
    for (const name of this.aggregates.keys()) {
      fields.push({ name });
    }
    return Schema.fromFields(fields);
  }
}

/**
 * 타입을 구분하는 그룹 키 조각
 */
function encodeKeyPart(value: CellValue): string {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return `date:${value.getTime()}`;
  return `${typeof value}:${String(value)}`;
}
