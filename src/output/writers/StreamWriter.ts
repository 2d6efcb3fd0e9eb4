/**
 * StreamWriter - 스트림 출력 (stdout / stderr)
 *
 * 데이터가 줄바꿈으로 끝나지 않으면 줄바꿈을 덧붙입니다.
 * 데이터와 줄바꿈을 한 번에 써서 동시 호출 시 출력이 섞이지 않게 합니다.
 */

import type { Writable } from 'node:stream';
import type { Writer } from '../../types';
import { throwIfCancelled } from '../../core/errors';

const NEWLINE = 0x0a;

export class StreamWriter implements Writer {
  constructor(
    private readonly stream: Writable,
    readonly name: string = 'stream'
  ) {}

  async write(format: string, data: Uint8Array, signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal, 'write', `format ${format}`);

    const chunk = data.length > 0 && data[data.length - 1] !== NEWLINE
      ? Buffer.concat([data, Buffer.from('\n')])
      : data;

    await new Promise<void>((resolve, reject) => {
      this.stream.write(chunk, error => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}

/**
 * 표준 출력 Writer
 */
export function stdoutWriter(): StreamWriter {
  return new StreamWriter(process.stdout, 'stdout');
}

/**
 * 표준 오류 Writer
 */
export function stderrWriter(): StreamWriter {
  return new StreamWriter(process.stderr, 'stderr');
}
