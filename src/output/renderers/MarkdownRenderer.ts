/**
 * MarkdownRenderer - Markdown 출력
 *
 * 텍스트, 테이블, 섹션, 접이식 섹션(<details>), 차트/다이어그램(테이블),
 * 그래프(목록)를 출력합니다. 다른 포맷 전용 raw 콘텐츠는 건너뜁니다.
 */

import * as aq from 'arquero';
import type { CellValue, Content, Row, TextContent } from '../../types';
import type { Schema } from '../../core/Schema';
import { BaseRenderer } from './BaseRenderer';

export class MarkdownRenderer extends BaseRenderer {
  readonly format = 'markdown';

  protected renderContent(content: Content): string {
    switch (content.type) {
      case 'text':
        return this.renderText(content) + '\n';

      case 'table':
        return this.titled(content.title, this.renderTable(content.schema, content.schema.keyOrder, content.id, content.rows));

      case 'raw':
        return content.format === this.format ? ensureNewline(content.data) : '';

      case 'section':
        return [
          `${'#'.repeat(Math.min(content.level + 1, 6))} ${content.title}\n`,
          ...this.renderChildren(content.contents),
        ].join('\n');

      case 'collapsible-section':
        return [
          `<details${content.expanded ? ' open' : ''}>`,
          `<summary>${content.title}</summary>\n`,
          ...this.renderChildren(content.contents),
          '</details>\n',
        ].join('\n');

      case 'chart':
        return this.titled(content.title, this.renderTable(undefined, columnsOf(content.data), content.id, content.data));

      case 'diagram':
        return this.titled(content.title, this.renderTable(undefined, columnsOf(content.rows), content.id, content.rows));

      case 'graph':
        return this.titled(
          content.title,
          content.edges
            .map(edge => `- ${edge.from} -> ${edge.to}${edge.label ? ` (${edge.label})` : ''}\n`)
            .join('')
        );
    }
  }

  // ==========================================================================
  // 내부
  // ==========================================================================

  private renderText(content: TextContent): string {
    const { style, text } = content;
    if (style.header) return `## ${text}`;

    let result = text;
    if (style.italic) result = `*${result}*`;
    if (style.bold) result = `**${result}**`;
    return result;
  }

  private renderChildren(contents: readonly Content[]): string[] {
    return contents.map(child => this.renderContent(child)).filter(text => text !== '');
  }

  private titled(title: string, body: string): string {
    return title === '' ? body : `### ${title}\n\n${body}`;
  }

  /**
   * 행 목록을 Markdown 테이블로 변환 (arquero)
   */
  private renderTable(
    schema: Schema | undefined,
    keys: readonly string[],
    contentId: string,
    rows: readonly Row[]
  ): string {
    if (keys.length === 0) return '';

    const columns: Record<string, string[]> = {};
    for (const key of keys) {
      columns[key] = rows.map(row => escapeCell(this.cellText(this.formatCell(schema, contentId, key, row[key]))));
    }

    return ensureNewline(aq.table(columns, [...keys]).toMarkdown({ limit: Infinity }));
  }
}

/**
 * 행 목록에서 등장 순서대로 컬럼 이름 수집
 */
function columnsOf(rows: readonly Readonly<Record<string, CellValue>>[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

/**
 * 테이블 셀 안의 `|`와 줄바꿈 이스케이프
 */
function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, '<br>');
}

function ensureNewline(text: string): string {
  return text.endsWith('\n') ? text : text + '\n';
}
