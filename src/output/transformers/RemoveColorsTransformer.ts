/**
 * RemoveColorsTransformer - ANSI 색상/커서 이스케이프 제거
 *
 * 모든 포맷에 적용되며 다른 후처리기보다 늦게 실행됩니다.
 */

import type { Transformer } from '../../types';
import { throwIfCancelled } from '../../core/errors';

const ANSI_PATTERN = /\x1B\[(?:[0-9]{1,3}(?:;[0-9]{1,3})*)?[mGK]/g;

export class RemoveColorsTransformer implements Transformer {
  readonly name = 'remove-colors';
  readonly priority = 1000;

  canTransform(): boolean {
    return true;
  }

  async transform(data: Uint8Array, format: string, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfCancelled(signal, 'transform', `format ${format}`);
    return Buffer.from(Buffer.from(data).toString('utf8').replace(ANSI_PATTERN, ''), 'utf8');
  }
}
