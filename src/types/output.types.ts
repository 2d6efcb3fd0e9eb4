/**
 * 출력 관련 외부 인터페이스
 *
 * Output 오케스트레이터가 소비하는 협력자들입니다.
 * 포맷별 인코딩, 저장 방식, 진행률 표시는 모두 이 인터페이스 뒤에서 교체 가능합니다.
 */

import type { Document } from '../core/Document';

// ============================================================================
// Renderer
// ============================================================================

/**
 * 스트리밍 렌더링 대상
 */
export interface RenderSink {
  write(chunk: Uint8Array): void | Promise<void>;
}

/**
 * 렌더러
 *
 * Document를 한 포맷의 바이트로 직렬화합니다.
 * 각 콘텐츠를 직렬화하기 전에 연산 파이프라인을 실행해야 하며,
 * 취소 신호를 존중해야 합니다.
 */
export interface Renderer {
  /** 렌더러가 생성하는 포맷 이름 */
  readonly format: string;

  render(document: Document, signal?: AbortSignal): Promise<Uint8Array>;

  renderTo(document: Document, sink: RenderSink, signal?: AbortSignal): Promise<void>;

  supportsStreaming(): boolean;
}

/**
 * 출력 포맷 (포맷 이름 + 렌더러)
 */
export interface Format {
  name: string;
  renderer: Renderer;
}

// ============================================================================
// Writer
// ============================================================================

/**
 * 렌더링된 바이트를 저장/전송하는 Writer
 *
 * 하나의 Writer 인스턴스가 여러 포맷 작업에서 동시에 호출될 수 있으므로
 * 구현체는 동시 호출에 안전해야 합니다.
 */
export interface Writer {
  /** 진단 메시지용 이름 (없으면 클래스 이름 사용) */
  readonly name?: string;

  write(format: string, data: Uint8Array, signal?: AbortSignal): Promise<void>;
}

// ============================================================================
// Transformer
// ============================================================================

/**
 * 렌더링된 바이트 후처리기
 *
 * priority가 낮을수록 먼저 실행됩니다.
 */
export interface Transformer {
  readonly name: string;
  readonly priority: number;

  canTransform(format: string): boolean;

  transform(data: Uint8Array, format: string, signal?: AbortSignal): Promise<Uint8Array>;
}

// ============================================================================
// Progress
// ============================================================================

/**
 * 진행률 표시
 */
export interface Progress {
  setTotal(total: number): void;
  setCurrent(current: number): void;
  increment(delta?: number): void;
  setStatus(status: string): void;
  complete(): void;
  fail(error: Error): void;
  close(): Promise<void>;
  isActive(): boolean;
}
