/**
 * Operation 인터페이스
 *
 * 콘텐츠에 붙어 렌더링 시점에 실행되는 상태 없는 변환 단위입니다.
 *
 * 파이프라인 구조:
 * Content → validate → apply → (다음 연산) → ... → 변환된 Content
 *
 * 각 Operation은 입력 콘텐츠를 변경하지 않고 새 콘텐츠를 반환해야 합니다.
 * 여러 렌더링에서 동시에 호출될 수 있으므로 내부 상태를 변경해서는 안 됩니다.
 */

import type { Content } from './content.types';

/**
 * 연산 실행 컨텍스트
 */
export interface OperationContext {
  /** 취소 신호 */
  signal?: AbortSignal;

  /** 현재 렌더링 중인 출력 포맷 (포맷 인식 연산용) */
  format?: string;
}

/**
 * 연산 인터페이스
 */
export interface Operation {
  /** 연산 이름 (진단용) */
  readonly name: string;

  /**
   * 구조적 유효성 검사
   *
   * 실패 시 ValidationError를 던집니다. apply() 전에 항상 호출됩니다.
   */
  validate(): void;

  /**
   * 연산 실행
   *
   * @returns 입력과 가변 상태를 공유하지 않는 새 콘텐츠 (또는 Promise)
   */
  apply(content: Content, ctx: OperationContext): Content | Promise<Content>;

  /**
   * 인접한 연산과 병합 가능 여부 (참고용 힌트)
   */
  canOptimize(other: Operation): boolean;

  /**
   * 주어진 출력 포맷에 이 연산을 적용할지 여부 (선택)
   *
   * 구현하지 않으면 모든 포맷에 적용됩니다.
   */
  supportsFormat?(format: string): boolean;
}
