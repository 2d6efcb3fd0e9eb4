/**
 * OperationPipeline - 콘텐츠 연산 파이프라인
 *
 * 콘텐츠에 붙은 연산들을 목록 순서대로 검증(validate) → 실행(apply)합니다.
 *
 * 파이프라인 구조:
 * Content → [취소 확인 → validate → apply] × N → 변환된 Content
 *
 * - 연산이 없으면 입력을 그대로 반환합니다.
 * - 첫 실패에서 즉시 중단합니다 (이후 연산은 실행되지 않음).
 * - 파이프라인은 복사를 하지 않습니다. 입력을 변경하지 않는 것은 각 연산의 책임입니다.
 * - 연산 순서를 바꾸거나 병합하지 않습니다 (canOptimize는 참고용).
 */

import type { Content, Operation, OperationContext } from '../../types';
import {
  CancellationError,
  OperationApplyError,
  OperationValidationError,
  ValidationError,
} from '../../core/errors';

// =============================================================================
// 타입
// =============================================================================

/**
 * 파이프라인 옵션
 */
export interface PipelineOptions {
  /** 콘텐츠 하나에 허용되는 최대 연산 수 (기본값: 100) */
  maxOperations?: number;

  /** 연산별 통계 기록 여부 (기본값: true) */
  collectStats?: boolean;
}

/**
 * 연산 하나의 실행 통계
 */
export interface OperationStats {
  /** 연산 이름 */
  name: string;

  /** 연산 목록 내 위치 */
  index: number;

  /** 실행 시간 (ms) */
  durationMs: number;

  /** 실행 후 행 수 (테이블인 경우) */
  rowsOut?: number;
}

/**
 * 파이프라인 실행 통계
 */
export interface PipelineStats {
  /** 입력 행 수 (테이블인 경우) */
  inputRows?: number;

  /** 출력 행 수 (테이블인 경우) */
  outputRows?: number;

  /** 전체 실행 시간 (ms) */
  durationMs: number;

  /** 연산별 통계 (collectStats가 false면 비어 있음) */
  operations: OperationStats[];

  /** 포맷 미지원으로 건너뛴 연산 수 */
  skipped: number;
}

/**
 * 파이프라인 실행 결과
 */
export interface PipelineResult {
  /** 변환된 콘텐츠 */
  content: Content;

  /** 실행 통계 */
  stats: PipelineStats;
}

const DEFAULT_MAX_OPERATIONS = 100;

// =============================================================================
// OperationPipeline 클래스
// =============================================================================

export class OperationPipeline {
  /** 파이프라인 옵션 */
  private readonly options: Required<PipelineOptions>;

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(options: PipelineOptions = {}) {
    this.options = {
      maxOperations: options.maxOperations ?? DEFAULT_MAX_OPERATIONS,
      collectStats: options.collectStats ?? true,
    };
  }

  // ==========================================================================
  // 파이프라인 실행
  // ==========================================================================

  /**
   * 파이프라인 실행
   *
   * @throws CancellationError 연산 사이에서 취소가 감지된 경우
   * @throws OperationValidationError 연산의 validate()가 실패한 경우
   * @throws OperationApplyError 연산의 apply()가 실패한 경우
   */
  async execute(content: Content, ctx: OperationContext = {}): Promise<PipelineResult> {
    const startTime = performance.now();
    const { operations } = content;
    const inputRows = countRows(content);

    const stats: PipelineStats = {
      inputRows,
      outputRows: inputRows,
      durationMs: 0,
      operations: [],
      skipped: 0,
    };

    // 연산이 없으면 그대로 반환
    if (operations.length === 0) {
      stats.durationMs = performance.now() - startTime;
      return { content, stats };
    }

    if (operations.length > this.options.maxOperations) {
      throw new ValidationError(
        'operations',
        operations.length,
        `content ${content.id} has ${operations.length} operations (max ${this.options.maxOperations})`
      );
    }

    let current = content;

    for (const [index, operation] of operations.entries()) {
      // 취소 확인
      if (ctx.signal?.aborted) {
        throw new CancellationError('pipeline', `content ${content.id}`, ctx.signal.reason);
      }

      if (ctx.format !== undefined && !this.appliesTo(operation, ctx.format, content.id, index)) {
        stats.skipped++;
        continue;
      }

      const opStart = this.options.collectStats ? performance.now() : 0;

      try {
        operation.validate();
      } catch (error) {
        throw new OperationValidationError(content.id, index, operation.name, error);
      }

      try {
        const result = operation.apply(current, ctx);
        current = result instanceof Promise ? await result : result;
      } catch (error) {
        throw new OperationApplyError(content.id, index, operation.name, error);
      }

      // 통계 기록
      if (this.options.collectStats) {
        stats.operations.push({
          name: operation.name,
          index,
          durationMs: performance.now() - opStart,
          rowsOut: countRows(current),
        });
      }
    }

    stats.outputRows = countRows(current);
    stats.durationMs = performance.now() - startTime;

    return { content: current, stats };
  }

  /**
   * 포맷 적용 여부 확인
   *
   * supportsFormat()이 던진 예외는 검증 실패로 취급합니다.
   */
  private appliesTo(operation: Operation, format: string, contentId: string, index: number): boolean {
    if (!operation.supportsFormat) return true;
    try {
      return operation.supportsFormat(format);
    } catch (error) {
      throw new OperationValidationError(contentId, index, operation.name, error);
    }
  }
}

// =============================================================================
// 헬퍼 함수
// =============================================================================

/**
 * 콘텐츠에 붙은 연산을 실행하고 결과 콘텐츠만 반환
 *
 * 통계가 필요하면 OperationPipeline.execute()를 사용하세요.
 */
export async function applyTransformations(
  content: Content,
  ctx: OperationContext = {},
  options: PipelineOptions = {}
): Promise<Content> {
  const pipeline = new OperationPipeline({ collectStats: false, ...options });
  const { content: result } = await pipeline.execute(content, ctx);
  return result;
}

/**
 * 테이블 행 수 (테이블이 아니면 undefined)
 */
function countRows(content: Content): number | undefined {
  return content.type === 'table' ? content.rows.length : undefined;
}
