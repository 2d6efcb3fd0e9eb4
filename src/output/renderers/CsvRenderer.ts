/**
 * CsvRenderer - CSV 출력
 *
 * 테이블 콘텐츠만 출력하며 테이블 사이는 빈 줄로 구분합니다.
 * 섹션 안의 테이블도 순서대로 포함됩니다.
 * 그 밖의 콘텐츠는 건너뜁니다.
 *
 * 인용/이스케이프는 arquero의 CSV 포맷터가 처리합니다.
 */

import * as aq from 'arquero';
import type { Content, TableContent } from '../../types';
import { BaseRenderer } from './BaseRenderer';

export class CsvRenderer extends BaseRenderer {
  readonly format = 'csv';

  protected renderContent(content: Content): string {
    switch (content.type) {
      case 'table':
        return this.renderTable(content);

      case 'section':
      case 'collapsible-section':
        return content.contents
          .map(child => this.renderContent(child))
          .filter(text => text !== '')
          .join('\n');

      default:
        return '';
    }
  }

  /**
   * 테이블 하나를 CSV로 변환 (마지막 줄바꿈 포함)
   */
  private renderTable(content: TableContent): string {
    const { schema } = content;
    const keys = schema.getKeyOrder();

    // 모든 값을 문자열로 변환해 arquero의 타입 추론을 피함
    const columns: Record<string, string[]> = {};
    for (const key of keys) {
      columns[key] = content.rows.map(row =>
        this.cellText(this.formatCell(schema, content.id, key, row[key]))
      );
    }

    const csv = aq.table(columns, keys).toCSV();
    return csv.replace(/\n+$/, '') + '\n';
  }
}
