/**
 * MultiWriter - 여러 Writer에 동시에 출력
 *
 * 모든 Writer에 병렬로 쓰고, 실패가 있으면 모두 모아 MultiWriteError로 던집니다.
 * 한 Writer의 실패가 다른 Writer의 쓰기를 막지 않습니다.
 */

import type { Writer } from '../../types';
import { DocRenderError, describeComponent, throwIfCancelled, toError } from '../../core/errors';

/**
 * 하위 Writer 실패 묶음
 */
export class MultiWriteError extends DocRenderError {
  readonly errors: readonly Error[];

  constructor(errors: Error[]) {
    super('MULTI_WRITE_ERROR', `multiple write errors: ${errors.map(e => e.message).join('; ')}`, {
      cause: errors[0],
    });
    this.name = 'MultiWriteError';
    this.errors = Object.freeze([...errors]);
  }
}

export class MultiWriter implements Writer {
  readonly name = 'multi';

  private writers: Writer[];

  constructor(...writers: Writer[]) {
    this.writers = [...writers];
  }

  addWriter(writer: Writer): void {
    this.writers = [...this.writers, writer];
  }

  removeWriter(writer: Writer): void {
    this.writers = this.writers.filter(w => w !== writer);
  }

  get size(): number {
    return this.writers.length;
  }

  async write(format: string, data: Uint8Array, signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal, 'write', `format ${format}`);

    // 호출 시점의 목록으로 실행
    const writers = [...this.writers];
    const results = await Promise.allSettled(writers.map(writer => writer.write(format, data, signal)));

    const errors: Error[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        const writer = writers[i];
        const label = writer ? describeComponent(writer) : `writer ${i}`;
        const error = toError(result.reason);
        errors.push(new Error(`${label}: ${error.message}`, { cause: error }));
      }
    });

    if (errors.length > 0) {
      throw new MultiWriteError(errors);
    }
  }
}
