/**
 * Document - 렌더링 대상 문서
 *
 * 순서가 있는 콘텐츠 목록과 메타데이터를 보관합니다.
 * 생성 후에는 변경되지 않으며 렌더링도 문서를 수정하지 않습니다.
 */

import type { Content } from '../types';

export class Document {
  /** 콘텐츠 목록 (순서 유지) */
  readonly contents: readonly Content[];

  /** 메타데이터 */
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(contents: readonly Content[] = [], metadata: Record<string, unknown> = {}) {
    this.contents = Object.freeze([...contents]);
    this.metadata = Object.freeze({ ...metadata });
    Object.freeze(this);
  }

  /**
   * 콘텐츠 목록 복사본 반환
   */
  getContents(): Content[] {
    return [...this.contents];
  }

  /**
   * 메타데이터 복사본 반환
   */
  getMetadata(): Record<string, unknown> {
    return { ...this.metadata };
  }

  /** 최상위 콘텐츠 개수 */
  get size(): number {
    return this.contents.length;
  }
}
