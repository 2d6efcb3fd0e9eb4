/**
 * LimitOperation - 앞에서부터 n개 행만 남김
 */

import type { Content, Operation } from '../../types';
import { ValidationError } from '../../core/errors';
import { copyRow, deriveTable, isTableContent } from '../../core/content';

export class LimitOperation implements Operation {
  readonly name = 'limit';

  constructor(private readonly count: number) {}

  validate(): void {
    if (!Number.isInteger(this.count) || this.count < 0) {
      throw new ValidationError('count', this.count, 'limit must be a non-negative integer');
    }
  }

  apply(content: Content): Content {
    if (!isTableContent(content)) {
      return content;
    }
    return deriveTable(content, { rows: content.rows.slice(0, this.count).map(copyRow) });
  }

  /**
   * 연속된 limit은 더 작은 값 하나로 합칠 수 있음
   */
  canOptimize(other: Operation): boolean {
    return other instanceof LimitOperation;
  }
}
