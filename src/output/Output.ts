/**
 * Output - 다중 포맷 렌더링 오케스트레이터
 *
 * 하나의 Document를 설정된 모든 포맷으로 동시에 렌더링하고,
 * 후처리기(Transformer)를 거쳐 모든 Writer에 씁니다.
 *
 * 포맷별 처리 순서:
 * 취소 확인 → Renderer.render → Transformer (priority 오름차순) → Writer (등록 순서, 쓰기 전마다 취소 확인)
 *
 * - 포맷끼리는 서로 기다리지 않으며 실행 순서도 보장되지 않습니다.
 * - 한 포맷이 실패해도 다른 포맷은 계속 진행됩니다 (롤백 없음).
 * - 한 포맷 안에서는 첫 실패에서 중단합니다 (남은 Writer는 건너뜀).
 * - 모든 실패는 출처와 함께 하나의 MultiError로 모입니다.
 *
 * @example
 * const output = new Output({
 *   formats: [Formats.json(), Formats.csv()],
 *   writers: [new FileWriter('./out'), stdoutWriter()],
 *   transformers: [new EmojiTransformer()],
 * });
 * await output.render(document, { signal: AbortSignal.timeout(5000) });
 */

import type { Format, Progress, Transformer, Writer } from '../types';
import type { Document } from '../core/Document';
import {
  CancellationError,
  MultiError,
  RenderError,
  TransformError,
  WriteError,
  componentType,
  describeComponent,
  isCancellation,
  toError,
  type MultiErrorEntry,
} from '../core/errors';
import { validateOutputConfig, type OutputConfig } from './config';
import { NoOpProgress } from './progress/NoOpProgress';

// =============================================================================
// 타입
// =============================================================================

/**
 * Output 생성 옵션
 */
export interface OutputOptions {
  formats?: Format[];
  writers?: Writer[];
  transformers?: Transformer[];
  /** 진행률 표시 (기본값: NoOpProgress) */
  progress?: Progress;
}

/**
 * render() 옵션
 */
export interface RenderOptions {
  /** 취소 신호 */
  signal?: AbortSignal;
}

/**
 * 포맷 작업 하나가 공유하는 상태
 */
interface RenderJob {
  document: Document;
  config: OutputConfig;
  transformers: Transformer[];
  signal?: AbortSignal;
  report: (entry: MultiErrorEntry) => void;
  onWritten: () => void;
}

// =============================================================================
// Output 클래스
// =============================================================================

export class Output {
  private formats: Format[];
  private writers: Writer[];
  private transformers: Transformer[];
  private progress: Progress;

  // ==========================================================================
  // 생성자
  // ==========================================================================

  constructor(options: OutputOptions = {}) {
    this.formats = [...(options.formats ?? [])];
    this.writers = [...(options.writers ?? [])];
    this.transformers = [...(options.transformers ?? [])];
    this.progress = options.progress ?? new NoOpProgress();
  }

  // ==========================================================================
  // 설정
  // ==========================================================================

  /**
   * 설정 변경은 진행 중인 render()에 영향을 주지 않습니다 (시작 시점 스냅샷 사용).
   */
  addFormat(format: Format): this {
    this.formats = [...this.formats, format];
    return this;
  }

  addWriter(writer: Writer): this {
    this.writers = [...this.writers, writer];
    return this;
  }

  addTransformer(transformer: Transformer): this {
    this.transformers = [...this.transformers, transformer];
    return this;
  }

  setProgress(progress: Progress): this {
    this.progress = progress;
    return this;
  }

  getFormats(): Format[] {
    return [...this.formats];
  }

  getWriters(): Writer[] {
    return [...this.writers];
  }

  getTransformers(): Transformer[] {
    return [...this.transformers];
  }

  getProgress(): Progress {
    return this.progress;
  }

  /**
   * 진행률 표시 종료
   */
  async close(): Promise<void> {
    await this.progress.close();
  }

  // ==========================================================================
  // 렌더링
  // ==========================================================================

  /**
   * 모든 포맷으로 렌더링 후 모든 Writer에 쓰기
   *
   * @throws ConfigurationError 포맷 또는 Writer가 없거나 설정이 잘못된 경우 (작업 시작 전)
   * @throws MultiError 하나 이상의 포맷/Writer가 실패한 경우 (모든 포맷 종료 후)
   */
  async render(document: Document, options: RenderOptions = {}): Promise<void> {
    const config = this.snapshot();
    validateOutputConfig(config);

    const { progress } = config;
    progress.setTotal(config.formats.length * config.writers.length);

    // 안정 정렬이므로 priority가 같으면 등록 순서 유지
    const transformers = [...config.transformers].sort((a, b) => a.priority - b.priority);

    const entries: MultiErrorEntry[] = [];
    let completed = 0;

    const job: RenderJob = {
      document,
      config,
      transformers,
      signal: options.signal,
      report: entry => {
        entries.push(entry);
      },
      onWritten: () => {
        completed++;
        progress.setCurrent(completed);
      },
    };

    const results = await Promise.allSettled(config.formats.map(format => this.renderFormat(format, job)));

    // renderFormat 내부에서 분류되지 않은 예외 (Progress 구현체 오류 등)
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        const format = config.formats[i]?.name ?? `#${i}`;
        entries.push({
          error: toError(result.reason),
          source: { component: 'renderer', details: { format } },
        });
      }
    });

    if (entries.length === 0) {
      progress.complete();
      return;
    }

    const aggregate = new MultiError('render', entries);
    progress.fail(aggregate);
    throw aggregate;
  }

  /**
   * 설정 스냅샷 (동기 복사)
   */
  private snapshot(): OutputConfig {
    return {
      formats: [...this.formats],
      writers: [...this.writers],
      transformers: [...this.transformers],
      progress: this.progress,
    };
  }

  // ==========================================================================
  // 포맷별 작업
  // ==========================================================================

  private async renderFormat(format: Format, job: RenderJob): Promise<void> {
    const { signal, config, report } = job;
    const { progress } = config;

    // 1. 취소 확인
    if (signal?.aborted) {
      report(cancellationEntry(format.name, 'render', signal.reason));
      return;
    }

    // 2. 렌더링
    progress.setStatus(`rendering ${format.name}`);
    let data: Uint8Array;
    try {
      data = await format.renderer.render(job.document, signal);
    } catch (error) {
      report(rendererEntry(format, error));
      return;
    }

    // 3. 후처리
    for (const transformer of job.transformers) {
      const inputSize = data.length;
      try {
        if (!transformer.canTransform(format.name)) continue;
        progress.setStatus(`transforming ${format.name} (${transformer.name})`);
        data = await transformer.transform(data, format.name, signal);
      } catch (error) {
        report(transformerEntry(format.name, transformer, inputSize, error));
        return;
      }
    }

    // 4. 쓰기
    for (const writer of config.writers) {
      if (signal?.aborted) {
        report(cancellationEntry(format.name, 'write', signal.reason));
        return;
      }

      progress.setStatus(`writing ${format.name}`);
      try {
        await writer.write(format.name, data, signal);
      } catch (error) {
        report(writerEntry(format.name, writer, data.length, error));
        return;
      }
      job.onWritten();
    }
  }
}

// =============================================================================
// 오류 분류
// =============================================================================

function cancellationEntry(format: string, stage: string, reason: unknown): MultiErrorEntry {
  return {
    error: new CancellationError(stage, `format ${format}`, reason),
    source: { component: 'cancellation', details: { format, stage } },
  };
}

/**
 * 이미 취소 오류면 그대로, 아니면 CancellationError로 감쌈
 */
function asCancellation(format: string, stage: string, error: unknown): MultiErrorEntry {
  if (error instanceof CancellationError) {
    return { error, source: { component: 'cancellation', details: { format, stage } } };
  }
  return cancellationEntry(format, stage, error);
}

function rendererEntry(format: Format, error: unknown): MultiErrorEntry {
  if (isCancellation(error)) {
    return asCancellation(format.name, 'render', error);
  }

  const renderer = componentType(format.renderer);
  const renderError = error instanceof RenderError ? error : new RenderError(format.name, renderer, error);
  const { outputSize } = renderError;

  return {
    error: renderError,
    source: {
      component: 'renderer',
      details: { format: format.name, renderer, ...(outputSize !== undefined ? { outputSize } : {}) },
    },
  };
}

function transformerEntry(format: string, transformer: Transformer, inputSize: number, error: unknown): MultiErrorEntry {
  if (isCancellation(error)) {
    return asCancellation(format, 'transform', error);
  }

  const name = describeComponent(transformer);
  return {
    error: new TransformError(name, format, inputSize, error),
    source: { component: 'transformer', details: { format, transformer: name, inputSize } },
  };
}

function writerEntry(format: string, writer: Writer, dataSize: number, error: unknown): MultiErrorEntry {
  if (isCancellation(error)) {
    return asCancellation(format, 'write', error);
  }

  const name = describeComponent(writer);
  return {
    error: new WriteError(name, format, dataSize, error),
    source: { component: 'writer', details: { format, writer: name, dataSize } },
  };
}
