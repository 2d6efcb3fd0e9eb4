/**
 * EmojiTransformer - 텍스트 표시를 이모지로 치환
 *
 * - `!!` → 🚨
 * - 단어 `OK`, `Yes`, `true` → ✅
 * - 단어 `No`, `false` → ❌
 *
 * 단어 치환은 단어 경계(\b)에서만 일어납니다 (`Nobody`는 그대로).
 */

import type { Transformer } from '../../types';
import { throwIfCancelled } from '../../core/errors';

const SUPPORTED_FORMATS: ReadonlySet<string> = new Set(['table', 'markdown', 'html', 'csv']);

const REPLACEMENTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/!!/g, '🚨'],
  [/\b(?:OK|Yes|true)\b/g, '✅'],
  [/\b(?:No|false)\b/g, '❌'],
];

export class EmojiTransformer implements Transformer {
  readonly name = 'emoji';
  readonly priority = 100;

  canTransform(format: string): boolean {
    return SUPPORTED_FORMATS.has(format);
  }

  async transform(data: Uint8Array, format: string, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfCancelled(signal, 'transform', `format ${format}`);

    let output = Buffer.from(data).toString('utf8');
    for (const [pattern, emoji] of REPLACEMENTS) {
      output = output.replace(pattern, emoji);
    }
    return Buffer.from(output, 'utf8');
  }
}
