import type { Writer } from '../../types';

/**
 * 함수를 Writer로 감쌉니다.
 *
 * @example
 * const collected: string[] = [];
 * const writer = writerFunc(async (format, data) => {
 *   collected.push(`${format}:${Buffer.from(data).toString()}`);
 * }, 'collector');
 */
export function writerFunc(
  fn: (format: string, data: Uint8Array, signal?: AbortSignal) => Promise<void> | void,
  name = 'func'
): Writer {
  return {
    name,
    async write(format, data, signal) {
      await fn(format, data, signal);
    },
  };
}
