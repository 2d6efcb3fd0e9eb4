/**
 * 오류 계층
 *
 * 모든 라이브러리 오류는 {@link DocRenderError}를 상속하므로
 * `instanceof`로 안전하게 구분할 수 있습니다.
 *
 * ```ts
 * try {
 *   await output.render(doc);
 * } catch (e) {
 *   if (e instanceof MultiError) {
 *     for (const err of e.bySource('writer')) { ... }
 *   }
 * }
 * ```
 *
 * 원인 오류는 ES2022 `Error.cause`로 연결됩니다.
 */

// ============================================================================
// 기본 오류
// ============================================================================

/** 모든 라이브러리 오류의 기반. 프로그램에서 매칭할 수 있는 code를 가집니다. */
export class DocRenderError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocRenderError';
    this.code = code;
  }
}

// ============================================================================
// 검증 / 설정
// ============================================================================

/** 연산이나 콘텐츠가 구조적으로 잘못된 경우. 재시도하지 않습니다. */
export class ValidationError extends DocRenderError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, message: string) {
    super('VALIDATION_ERROR', `Invalid "${field}": ${message}`);
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
  }
}

/** Output 설정이 잘못된 경우. 렌더링 작업이 시작되기 전에 발생합니다. */
export class ConfigurationError extends DocRenderError {
  readonly issues: readonly string[];

  constructor(issues: string[]) {
    super('CONFIGURATION_ERROR', `invalid output configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = Object.freeze([...issues]);
  }
}

// ============================================================================
// 취소
// ============================================================================

/** 단계 사이에서 취소 신호가 감지된 경우 */
export class CancellationError extends DocRenderError {
  /** 취소된 작업 (예: 'pipeline', 'render', 'write') */
  readonly operation: string;

  /** 영향받은 대상 (콘텐츠 ID 또는 포맷 이름) */
  readonly target: string;

  constructor(operation: string, target: string, cause: unknown) {
    super('CANCELLED', `${operation} cancelled for ${target}: ${describeCause(cause)}`, { cause });
    this.name = 'CancellationError';
    this.operation = operation;
    this.target = target;
  }
}

// ============================================================================
// 사용자 콜백
// ============================================================================

/**
 * 사용자 콜백 종류
 */
export type CallbackKind = 'predicate' | 'comparator' | 'aggregate' | 'derive' | 'formatter';

/** 사용자 제공 함수가 예외를 던진 경우 */
export class CallbackError extends DocRenderError {
  readonly callback: CallbackKind;

  constructor(callback: CallbackKind, cause: unknown) {
    super('CALLBACK_ERROR', `${callback} callback threw: ${describeCause(cause)}`, { cause });
    this.name = 'CallbackError';
    this.callback = callback;
  }
}

/**
 * 사용자 콜백을 예외 경계 안에서 실행합니다.
 *
 * 던져진 값은 CallbackError로 변환됩니다.
 */
export function invokeCallback<T>(callback: CallbackKind, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw new CallbackError(callback, error);
  }
}

// ============================================================================
// 파이프라인
// ============================================================================

/**
 * 파이프라인 오류 단계
 */
export type PipelineStage = 'validate' | 'apply';

/** 콘텐츠의 연산 체인 실행 중 실패 */
export class PipelineError extends DocRenderError {
  readonly contentId: string;
  readonly operationIndex: number;
  readonly operationName: string;
  readonly stage: PipelineStage;

  constructor(
    code: string,
    stage: PipelineStage,
    contentId: string,
    operationIndex: number,
    operationName: string,
    cause: unknown
  ) {
    const verb = stage === 'validate' ? 'failed validation' : 'failed to apply';
    super(
      code,
      `content ${contentId}: operation ${operationIndex} (${operationName}) ${verb}: ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'PipelineError';
    this.contentId = contentId;
    this.operationIndex = operationIndex;
    this.operationName = operationName;
    this.stage = stage;
  }
}

/** validate() 실패. apply()는 호출되지 않았습니다. */
export class OperationValidationError extends PipelineError {
  constructor(contentId: string, operationIndex: number, operationName: string, cause: unknown) {
    super('OPERATION_INVALID', 'validate', contentId, operationIndex, operationName, cause);
    this.name = 'OperationValidationError';
  }
}

/** apply() 실패 (예: 스키마에 없는 컬럼 참조) */
export class OperationApplyError extends PipelineError {
  constructor(contentId: string, operationIndex: number, operationName: string, cause: unknown) {
    super('OPERATION_FAILED', 'apply', contentId, operationIndex, operationName, cause);
    this.name = 'OperationApplyError';
  }
}

// ============================================================================
// 오케스트레이터 경계
// ============================================================================

/** 렌더러 실패 */
export class RenderError extends DocRenderError {
  readonly format: string;
  readonly renderer: string;
  /** 실패 전까지 생성된 바이트 수 (알 수 있는 경우) */
  readonly outputSize?: number;
  /** 실패한 콘텐츠 ID (알 수 있는 경우) */
  readonly contentId?: string;

  constructor(
    format: string,
    renderer: string,
    cause: unknown,
    details: { outputSize?: number; contentId?: string } = {}
  ) {
    const parts = [`render failed`, `format=${format}`, `renderer=${renderer}`];
    if (details.contentId !== undefined) parts.push(`content_id=${details.contentId}`);
    if (details.outputSize !== undefined) parts.push(`output_size=${details.outputSize}`);
    parts.push(`cause: ${describeCause(cause)}`);

    super('RENDER_ERROR', parts.join('; '), { cause });
    this.name = 'RenderError';
    this.format = format;
    this.renderer = renderer;
    this.outputSize = details.outputSize;
    this.contentId = details.contentId;
  }
}

/** 바이트 후처리기 실패 */
export class TransformError extends DocRenderError {
  readonly transformer: string;
  readonly format: string;
  readonly inputSize: number;

  constructor(transformer: string, format: string, inputSize: number, cause: unknown) {
    super(
      'TRANSFORM_ERROR',
      `transformer ${transformer} failed for format ${format}: ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'TransformError';
    this.transformer = transformer;
    this.format = format;
    this.inputSize = inputSize;
  }
}

/** Writer 실패 */
export class WriteError extends DocRenderError {
  readonly writer: string;
  readonly format: string;
  readonly dataSize: number;

  constructor(writer: string, format: string, dataSize: number, cause: unknown) {
    super(
      'WRITE_ERROR',
      `write error for ${writer} writer (format: ${format}, ${dataSize} bytes): ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'WriteError';
    this.writer = writer;
    this.format = format;
    this.dataSize = dataSize;
  }
}

// ============================================================================
// 집계 오류
// ============================================================================

/**
 * 오류를 발생시킨 컴포넌트
 */
export type ErrorComponent = 'renderer' | 'transformer' | 'writer' | 'cancellation';

/**
 * 오류 출처 정보
 */
export interface ErrorSource {
  component: ErrorComponent;
  details: Readonly<Record<string, unknown>>;
}

/**
 * 집계 오류 항목
 */
export interface MultiErrorEntry {
  error: Error;
  source: ErrorSource;
}

/**
 * 한 번의 render() 호출에서 발생한 포맷/Writer별 실패 묶음
 *
 * 각 실패를 발생 컴포넌트별로 분류합니다.
 */
export class MultiError extends DocRenderError {
  readonly operation: string;
  readonly entries: readonly MultiErrorEntry[];

  constructor(operation: string, entries: MultiErrorEntry[]) {
    super('MULTI_ERROR', formatMultiError(operation, entries), { cause: entries[0]?.error });
    this.name = 'MultiError';
    this.operation = operation;
    this.entries = Object.freeze([...entries]);
  }

  /** 포함된 오류 목록 (수집 순서) */
  get errors(): Error[] {
    return this.entries.map(entry => entry.error);
  }

  /** 오류 개수 */
  get size(): number {
    return this.entries.length;
  }

  /** 특정 컴포넌트에서 발생한 오류만 반환 */
  bySource(component: ErrorComponent): Error[] {
    return this.entries
      .filter(entry => entry.source.component === component)
      .map(entry => entry.error);
  }
}

function formatSource(source: ErrorSource): string {
  const parts = [`component=${source.component}`];
  for (const [key, value] of Object.entries(source.details)) {
    parts.push(`${key}=${String(value)}`);
  }
  return `[${parts.join(', ')}]`;
}

function formatMultiError(operation: string, entries: MultiErrorEntry[]): string {
  const [first] = entries;
  if (!first) {
    return `${operation}: no errors`;
  }

  if (entries.length === 1) {
    return `${operation}: ${first.error.message} ${formatSource(first.source)}`;
  }

  const lines = [`${operation} failed with ${entries.length} errors:`];
  entries.forEach((entry, i) => {
    lines.push(`  ${i + 1}. ${entry.error.message} ${formatSource(entry.source)}`);
  });
  return lines.join('\n');
}

// ============================================================================
// 유틸리티
// ============================================================================

/**
 * 던져진 값을 Error로 정규화
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * 원인 값을 메시지 문자열로 변환
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'object' && cause !== null && 'message' in cause) {
    return String(cause.message);
  }
  return String(cause);
}

/**
 * 취소로 인한 오류인지 확인 (cause 체인을 따라감)
 *
 * CancellationError와 AbortSignal의 AbortError / TimeoutError를 인식합니다.
 */
export function isCancellation(error: unknown): boolean {
  let current: unknown = error;
  const seen = new Set<unknown>();

  while (typeof current === 'object' && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof CancellationError) return true;
    if ('name' in current && (current.name === 'AbortError' || current.name === 'TimeoutError')) {
      return true;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}

/**
 * 진단용 컴포넌트 이름
 *
 * name 속성이 있으면 사용하고, 없으면 생성자 이름을 사용합니다.
 */
export function describeComponent(component: object): string {
  if ('name' in component && typeof component.name === 'string' && component.name !== '') {
    return component.name;
  }
  return component.constructor.name || 'anonymous';
}

/**
 * 진단용 타입 이름 (항상 생성자 이름)
 */
export function componentType(component: object): string {
  return component.constructor.name || 'anonymous';
}

/**
 * 취소 신호가 이미 발생했으면 CancellationError를 던집니다.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string, target: string): void {
  if (signal?.aborted) {
    throw new CancellationError(operation, target, signal.reason);
  }
}
