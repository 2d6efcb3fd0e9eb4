/**
 * JsonRenderer - JSON 출력
 *
 * 콘텐츠가 하나면 그 객체를, 여러 개면 배열을 출력합니다.
 */

import type { Content } from '../../types';
import type { Document } from '../../core/Document';
import { BaseRenderer } from './BaseRenderer';

export class JsonRenderer extends BaseRenderer {
  readonly format = 'json';

  protected readonly defaultSeparator = ',\n';

  /** 출력 형태(객체/배열)가 콘텐츠 수에 따라 결정됨 */
  supportsStreaming(): boolean {
    return false;
  }

  protected header(document: Document): string {
    return document.contents.length === 1 ? '' : '[\n';
  }

  protected footer(document: Document): string {
    return document.contents.length === 1 ? '\n' : '\n]\n';
  }

  protected renderContent(content: Content): string {
    return JSON.stringify(this.toPlain(content), null, 2);
  }
}
