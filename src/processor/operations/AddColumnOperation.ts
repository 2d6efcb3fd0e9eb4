/**
 * AddColumnOperation - 파생 컬럼 추가
 *
 * 각 행에 fn(row)의 결과를 새 컬럼으로 추가합니다.
 * position을 생략하거나 컬럼 수 이상이면 맨 끝에 추가됩니다.
 *
 * @example
 * addColumn('total', row => Number(row.price) * Number(row.qty), 2);
 */

import type { Content, DeriveFunction, FieldType, Operation, Row } from '../../types';
import { ValidationError, invokeCallback } from '../../core/errors';
import { copyRow, deriveTable, isTableContent } from '../../core/content';

export class AddColumnOperation implements Operation {
  readonly name = 'addColumn';

  constructor(
    private readonly column: string,
    private readonly fn: DeriveFunction | undefined,
    private readonly position?: number,
    private readonly type?: FieldType
  ) {}

  validate(): void {
    if (this.column === '') {
      throw new ValidationError('name', this.column, 'column name must not be empty');
    }
    if (typeof this.fn !== 'function') {
      throw new ValidationError('fn', this.fn, 'addColumn requires a derive function');
    }
    if (this.position !== undefined && (!Number.isInteger(this.position) || this.position < 0)) {
      throw new ValidationError('position', this.position, 'position must be a non-negative integer');
    }
  }

  apply(content: Content): Content {
    if (!isTableContent(content)) {
      return content;
    }

    const { column, fn } = this;
    if (!fn) {
      throw new ValidationError('fn', fn, 'addColumn requires a derive function');
    }
    if (content.schema.hasField(column)) {
      throw new ValidationError('name', column, `column "${column}" already exists`);
    }

    const schema = content.schema.withField({ name: column, type: this.type }, this.position);
    const rows: Row[] = content.rows.map(row => {
      const copy = copyRow(row);
      copy[column] = invokeCallback('derive', () => fn(row));
      return copy;
    });

    return deriveTable(content, { schema, rows });
  }

  canOptimize(): boolean {
    return false;
  }
}
