/**
 * DocumentBuilder - 문서 조립 도우미
 *
 * 메서드 체이닝으로 콘텐츠를 추가하고 build()로 동결된 Document를 얻습니다.
 * 콘텐츠 생성 중 발생한 오류는 즉시 던지지 않고 모아 두었다가
 * hasErrors() / getErrors()로 확인할 수 있습니다.
 *
 * @example
 * const doc = new DocumentBuilder()
 *   .header('월간 보고서')
 *   .table('Sales', rows, { schema: ['region', 'amount'] })
 *   .section('상세', b => b.text('지역별 합계'))
 *   .build();
 */

import type { CellValue, Content, GraphEdge, Row, TextStyle } from '../types';
import { Document } from './Document';
import {
  createChartContent,
  createCollapsibleSection,
  createDiagramContent,
  createGraphContent,
  createRawContent,
  createSectionContent,
  createTableContent,
  createTextContent,
  type CollapsibleOptions,
  type ContentOptions,
  type SectionOptions,
  type TableOptions,
} from './content';
import { toError } from './errors';

export class DocumentBuilder {
  /** 추가된 콘텐츠 */
  private contents: Content[] = [];

  /** 메타데이터 */
  private metadata: Record<string, unknown> = {};

  /** 수집된 생성 오류 */
  private errors: Error[] = [];

  /** build() 호출 여부 */
  private built = false;

  // ==========================================================================
  // 콘텐츠 추가
  // ==========================================================================

  /**
   * 이미 만들어진 콘텐츠 추가
   */
  addContent(content: Content): this {
    return this.push(() => content);
  }

  table(title: string, rows: readonly Row[], options: TableOptions = {}): this {
    return this.push(() => createTableContent(title, rows, options));
  }

  text(text: string, style: TextStyle = {}, options: ContentOptions = {}): this {
    return this.push(() => createTextContent(text, style, options));
  }

  /**
   * 헤더 텍스트 추가 (굵게 + header 스타일)
   */
  header(text: string, options: ContentOptions = {}): this {
    return this.push(() => createTextContent(text, { header: true, bold: true }, options));
  }

  raw(format: string, data: string, options: ContentOptions = {}): this {
    return this.push(() => createRawContent(format, data, options));
  }

  /**
   * 하위 빌더로 섹션 추가
   *
   * 하위 빌더의 오류는 이 빌더로 합쳐집니다.
   */
  section(title: string, fn: (builder: DocumentBuilder) => void, options: SectionOptions = {}): this {
    return this.push(() => createSectionContent(title, this.buildChildren(fn), options));
  }

  collapsibleSection(
    title: string,
    fn: (builder: DocumentBuilder) => void,
    options: CollapsibleOptions = {}
  ): this {
    return this.push(() => createCollapsibleSection(title, this.buildChildren(fn), options));
  }

  chart(title: string, chartType: string, data: readonly Row[], options: ContentOptions = {}): this {
    return this.push(() => createChartContent(title, chartType, data, options));
  }

  graph(title: string, edges: readonly GraphEdge[], options: ContentOptions = {}): this {
    return this.push(() => createGraphContent(title, edges, options));
  }

  diagram(
    title: string,
    diagramType: string,
    rows: readonly Row[],
    settings: Record<string, CellValue> = {},
    options: ContentOptions = {}
  ): this {
    return this.push(() => createDiagramContent(title, diagramType, rows, settings, options));
  }

  // ==========================================================================
  // 메타데이터
  // ==========================================================================

  setMetadata(key: string, value: unknown): this {
    if (this.assertOpen()) {
      this.metadata[key] = value;
    }
    return this;
  }

  // ==========================================================================
  // 오류 / 빌드
  // ==========================================================================

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  /**
   * 수집된 오류 복사본
   */
  getErrors(): Error[] {
    return [...this.errors];
  }

  /**
   * 동결된 Document 생성
   *
   * 이후 빌더에 대한 호출은 오류로 기록되고 무시됩니다.
   */
  build(): Document {
    const document = new Document(this.contents, this.metadata);
    this.built = true;
    this.contents = [];
    this.metadata = {};
    return document;
  }

  // ==========================================================================
  // 내부
  // ==========================================================================

  private push(create: () => Content): this {
    if (!this.assertOpen()) return this;

    try {
      this.contents.push(create());
    } catch (error) {
      this.errors.push(toError(error));
    }
    return this;
  }

  private buildChildren(fn: (builder: DocumentBuilder) => void): Content[] {
    const child = new DocumentBuilder();
    fn(child);
    this.errors.push(...child.getErrors());
    return child.build().getContents();
  }

  private assertOpen(): boolean {
    if (this.built) {
      this.errors.push(new Error('DocumentBuilder: build() was already called'));
      return false;
    }
    return true;
  }
}
