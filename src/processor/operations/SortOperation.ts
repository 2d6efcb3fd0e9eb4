/**
 * SortOperation - 정렬 연산
 *
 * 정렬 키 목록 또는 커스텀 비교 함수로 행을 안정 정렬합니다.
 * 비교 결과가 같은 행은 원래 순서를 유지합니다.
 *
 * @example
 * sortBy({ columnKey: 'amount', direction: 'desc' }, { columnKey: 'region', direction: 'asc' });
 * sortBy((a, b) => String(a.name).length - String(b.name).length);
 */

import type { Content, Operation, Row, RowComparator, SortKey } from '../../types';
import { ValidationError, invokeCallback } from '../../core/errors';
import { copyRow, deriveTable, isTableContent } from '../../core/content';
import { compareValues } from './compare';

// =============================================================================
// SortOperation 클래스
// =============================================================================

export class SortOperation implements Operation {
  readonly name = 'sort';

  /** 정렬 키 (앞쪽이 우선) */
  private readonly keys: readonly SortKey[];

  /** 커스텀 비교 함수 */
  private readonly comparator?: RowComparator;

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(criteria: readonly SortKey[] | RowComparator) {
    if (typeof criteria === 'function') {
      this.comparator = criteria;
      this.keys = [];
    } else {
      this.keys = Object.freeze(criteria.map(key => ({ ...key })));
    }
  }

  // ==========================================================================
  // Operation 구현
  // ==========================================================================

  validate(): void {
    if (this.comparator) return;

    if (this.keys.length === 0) {
      throw new ValidationError('keys', this.keys, 'sort requires at least one key');
    }

    this.keys.forEach((key, i) => {
      if (key.columnKey === '') {
        throw new ValidationError(`keys[${i}].columnKey`, key.columnKey, 'column key must not be empty');
      }
      if (key.direction !== 'asc' && key.direction !== 'desc') {
        throw new ValidationError(`keys[${i}].direction`, key.direction, 'direction must be "asc" or "desc"');
      }
    });
  }

  apply(content: Content): Content {
    if (!isTableContent(content)) {
      return content;
    }

    for (const key of this.keys) {
      if (!content.schema.hasField(key.columnKey)) {
        throw new ValidationError('columnKey', key.columnKey, `column "${key.columnKey}" not found in schema`);
      }
    }

    // Array.prototype.sort는 안정 정렬 (ES2019+)
    const rows = content.rows.map(copyRow);
    const { comparator } = this;
    if (comparator) {
      rows.sort((a, b) => invokeCallback('comparator', () => comparator(a, b)));
    } else {
      rows.sort((a, b) => this.compareRows(a, b));
    }

    return deriveTable(content, { rows });
  }

  canOptimize(): boolean {
    return false;
  }

  // ==========================================================================
  // 정렬 로직
  // ==========================================================================

  /**
   * 두 행 비교 (다중 정렬)
   */
  private compareRows(rowA: Row, rowB: Row): number {
    for (const { columnKey, direction } of this.keys) {
      const comparison = compareValues(rowA[columnKey], rowB[columnKey]);
      if (comparison !== 0) {
        return direction === 'asc' ? comparison : -comparison;
      }
    }

    return 0;
  }
}
