/**
 * BaseRenderer - 렌더러 공통 구현
 *
 * 문서의 콘텐츠를 순서대로 렌더링하는 템플릿입니다.
 * 각 콘텐츠는 직렬화 직전에 연산 파이프라인을 거칩니다 (섹션 하위 콘텐츠 포함).
 *
 * 하위 클래스는 renderContent()만 구현하면 되고,
 * 필요하면 header() / footer() / defaultSeparator를 재정의합니다.
 *
 * 실패 처리:
 * - 취소는 CancellationError 그대로 전달
 * - 그 밖의 실패는 RenderError로 감싸며, 그때까지 출력한 바이트 수를 기록
 * - 필드 포맷터 예외는 렌더링을 중단하지 않고 원래 값으로 대체
 */

import type { CellValue, Content, Renderer, RenderSink, Row } from '../../types';
import type { Document } from '../../core/Document';
import type { Schema } from '../../core/Schema';
import {
  CallbackError,
  RenderError,
  componentType,
  invokeCallback,
  isCancellation,
  throwIfCancelled,
} from '../../core/errors';
import { OperationPipeline, type PipelineOptions } from '../../processor/pipeline/OperationPipeline';

// =============================================================================
// 타입
// =============================================================================

/**
 * 포맷터 오류 처리기
 */
export type FormatErrorHandler = (error: CallbackError, details: { contentId: string; field: string }) => void;

/**
 * 렌더러 옵션
 */
export interface RendererOptions {
  /** 필드 포맷터 예외 처리기 (기본값: console.warn) */
  onFormatError?: FormatErrorHandler;

  /** 콘텐츠 사이 구분자 (기본값: 포맷별) */
  separator?: string;

  /** 파이프라인 옵션 */
  pipeline?: PipelineOptions;
}

/**
 * JSON / YAML 직렬화용 일반 값
 */
export type PlainValue = string | number | boolean | null | PlainValue[] | { [key: string]: PlainValue };

// =============================================================================
// BaseRenderer 클래스
// =============================================================================

export abstract class BaseRenderer implements Renderer {
  /** 포맷 이름 */
  abstract readonly format: string;

  /** 콘텐츠 사이 기본 구분자 */
  protected readonly defaultSeparator: string = '\n';

  /** 렌더러 옵션 */
  protected readonly options: RendererOptions;

  /** 콘텐츠별 연산 파이프라인 */
  private readonly pipeline: OperationPipeline;

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(options: RendererOptions = {}) {
    this.options = { ...options };
    this.pipeline = new OperationPipeline({ collectStats: false, ...options.pipeline });
  }

  // ==========================================================================
  // Renderer 구현
  // ==========================================================================

  supportsStreaming(): boolean {
    return true;
  }

  /**
   * 문서 전체를 바이트로 렌더링
   */
  async render(document: Document, signal?: AbortSignal): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    await this.renderTo(document, { write: chunk => { chunks.push(chunk); } }, signal);
    return Buffer.concat(chunks);
  }

  /**
   * 콘텐츠 단위로 sink에 출력
   */
  async renderTo(document: Document, sink: RenderSink, signal?: AbortSignal): Promise<void> {
    const separator = this.options.separator ?? this.defaultSeparator;
    let written = 0;
    let emitted = 0;
    let contentId: string | undefined;

    const emit = async (text: string): Promise<void> => {
      if (text === '') return;
      const chunk = Buffer.from(text, 'utf8');
      await sink.write(chunk);
      written += chunk.length;
    };

    try {
      await emit(this.header(document));

      for (const content of document.contents) {
        throwIfCancelled(signal, 'render', `format ${this.format}`);
        contentId = content.id;

        const prepared = await this.prepare(content, signal);
        const text = this.renderContent(prepared);
        if (text === '') continue;

        await emit(emitted > 0 ? separator + text : text);
        emitted++;
      }
      contentId = undefined;

      await emit(this.footer(document));
    } catch (error) {
      if (isCancellation(error) || error instanceof RenderError) {
        throw error;
      }
      throw new RenderError(this.format, componentType(this), error, { outputSize: written, contentId });
    }
  }

  // ==========================================================================
  // 하위 클래스 확장 지점
  // ==========================================================================

  /**
   * 콘텐츠 하나를 문자열로 직렬화 (빈 문자열이면 건너뜀)
   */
  protected abstract renderContent(content: Content): string;

  /** 문서 앞부분 */
  protected header(_document: Document): string {
    return '';
  }

  /** 문서 뒷부분 */
  protected footer(_document: Document): string {
    return '';
  }

  // ==========================================================================
  // 파이프라인
  // ==========================================================================

  /**
   * 연산 파이프라인 실행 (섹션은 하위 콘텐츠까지)
   */
  private async prepare(content: Content, signal?: AbortSignal): Promise<Content> {
    const { content: transformed } = await this.pipeline.execute(content, { signal, format: this.format });

    if (transformed.type === 'section' || transformed.type === 'collapsible-section') {
      const contents: Content[] = [];
      for (const child of transformed.contents) {
        throwIfCancelled(signal, 'render', `format ${this.format}`);
        contents.push(await this.prepare(child, signal));
      }
      return { ...transformed, contents };
    }

    return transformed;
  }

  // ==========================================================================
  // 셀 포맷팅
  // ==========================================================================

  /**
   * 필드 포맷터 적용
   *
   * 포맷터가 없으면 값을 그대로 반환합니다.
   * 포맷터가 예외를 던지면 onFormatError에 알리고 원래 값을 사용합니다.
   */
  protected formatCell(schema: Schema | undefined, contentId: string, field: string, value: CellValue): CellValue {
    const formatter = schema?.findField(field)?.formatter;
    if (!formatter) return value;

    try {
      return invokeCallback('formatter', () => formatter(value));
    } catch (error) {
      if (!(error instanceof CallbackError)) throw error;
      this.reportFormatError(error, contentId, field);
      return value;
    }
  }

  /**
   * 셀 값을 문자열로 변환 (빈 값은 빈 문자열, 날짜는 ISO 8601)
   */
  protected cellText(value: CellValue): string {
    if (value === null || value === undefined) return '';
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? '' : value.toISOString();
    return String(value);
  }

  /**
   * 표시 컬럼 순서대로 포맷팅된 행 생성
   */
  protected formatRow(schema: Schema | undefined, keys: readonly string[], contentId: string, row: Row): Row {
    const result: Row = {};
    for (const key of keys) {
      result[key] = this.formatCell(schema, contentId, key, row[key]);
    }
    return result;
  }

  private reportFormatError(error: CallbackError, contentId: string, field: string): void {
    if (this.options.onFormatError) {
      this.options.onFormatError(error, { contentId, field });
      return;
    }
    console.warn(`${componentType(this)}: formatter for "${field}" in content ${contentId} failed: ${error.message}`);
  }

  // ==========================================================================
  // 일반 값 변환 (JSON / YAML)
  // ==========================================================================

  /**
   * 콘텐츠를 직렬화 가능한 일반 값으로 변환
   */
  protected toPlain(content: Content): PlainValue {
    switch (content.type) {
      case 'table':
        return {
          type: 'table',
          title: content.title,
          columns: [...content.schema.keyOrder],
          rows: content.rows.map(row =>
            this.plainRow(this.formatRow(content.schema, content.schema.keyOrder, content.id, row))
          ),
        };

      case 'text':
        return { type: 'text', text: content.text, ...this.plainStyle(content) };

      case 'raw':
        return { type: 'raw', format: content.format, data: content.data };

      case 'section':
        return {
          type: 'section',
          title: content.title,
          level: content.level,
          contents: content.contents.map(child => this.toPlain(child)),
        };

      case 'collapsible-section':
        return {
          type: 'collapsible-section',
          title: content.title,
          level: content.level,
          expanded: content.expanded,
          contents: content.contents.map(child => this.toPlain(child)),
        };

      case 'chart':
        return {
          type: 'chart',
          title: content.title,
          chartType: content.chartType,
          data: content.data.map(row => this.plainRow(row)),
        };

      case 'graph':
        return {
          type: 'graph',
          title: content.title,
          edges: content.edges.map(edge => ({
            from: edge.from,
            to: edge.to,
            ...(edge.label !== undefined ? { label: edge.label } : {}),
          })),
        };

      case 'diagram':
        return {
          type: 'diagram',
          title: content.title,
          diagramType: content.diagramType,
          rows: content.rows.map(row => this.plainRow(row)),
          settings: this.plainRow(content.settings),
        };
    }
  }

  protected plainValue(value: CellValue): PlainValue {
    if (value === undefined || value === null) return null;
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
    return value;
  }

  private plainRow(row: Readonly<Record<string, CellValue>>): { [key: string]: PlainValue } {
    const result: { [key: string]: PlainValue } = {};
    for (const [key, value] of Object.entries(row)) {
      result[key] = this.plainValue(value);
    }
    return result;
  }

  private plainStyle(content: Extract<Content, { type: 'text' }>): { style?: { [key: string]: PlainValue } } {
    const entries = Object.entries(content.style).filter(
      (entry): entry is [string, string | number | boolean] => entry[1] !== undefined
    );
    return entries.length > 0 ? { style: Object.fromEntries(entries) } : {};
  }
}
