/**
 * FileWriter - 포맷별 파일 출력
 *
 * 파일 이름은 패턴의 `{format}`, `{ext}`를 치환해 만듭니다.
 * 기존 파일은 덮어씁니다.
 *
 * @example
 * const writer = new FileWriter('./reports', 'report-{format}.{ext}');
 * await writer.write('markdown', data); // ./reports/report-markdown.md
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Writer } from '../../types';
import { throwIfCancelled } from '../../core/errors';
import { FORMAT_EXTENSIONS } from '../renderers/formats';

/**
 * FileWriter 옵션
 */
export interface FileWriterOptions {
  /** 포맷 → 확장자 매핑 (기본 매핑에 덮어씀) */
  extensions?: Record<string, string>;

  /** 파일 권한 (기본값: 0o644) */
  mode?: number;
}

export const DEFAULT_FILE_PATTERN = 'output-{format}.{ext}';

export class FileWriter implements Writer {
  readonly name = 'file';

  /** 출력 디렉토리 (절대 경로) */
  readonly directory: string;

  /** 파일 이름 패턴 */
  readonly pattern: string;

  private readonly extensions: Record<string, string>;
  private readonly mode: number;

  /** 같은 파일에 대한 동시 쓰기 직렬화 */
  private queue: Promise<void> = Promise.resolve();

  constructor(directory: string, pattern: string = DEFAULT_FILE_PATTERN, options: FileWriterOptions = {}) {
    this.directory = path.resolve(directory);
    this.pattern = pattern === '' ? DEFAULT_FILE_PATTERN : pattern;
    this.extensions = { ...FORMAT_EXTENSIONS, ...options.extensions };
    this.mode = options.mode ?? 0o644;
  }

  async write(format: string, data: Uint8Array, signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal, 'write', `format ${format}`);
    if (format === '') {
      throw new Error('format cannot be empty');
    }

    const fullPath = this.resolvePath(format);

    const task = this.queue.then(async () => {
      await mkdir(path.dirname(fullPath), { recursive: true });
      await writeFile(fullPath, data, { mode: this.mode });
    });
    this.queue = task.then(
      () => undefined,
      () => undefined
    );
    await task;
  }

  /**
   * 포맷에 해당하는 파일 경로 계산
   *
   * 디렉토리 밖을 가리키는 이름은 거부합니다.
   */
  resolvePath(format: string): string {
    const ext = this.extensions[format] ?? format;
    const filename = this.pattern.replaceAll('{format}', format).replaceAll('{ext}', ext);

    if (filename.includes('..')) {
      throw new Error(`invalid filename "${filename}": contains '..'`);
    }
    if (filename.includes('\0')) {
      throw new Error(`invalid filename "${filename}": contains null bytes`);
    }
    if (path.isAbsolute(filename)) {
      throw new Error(`invalid filename "${filename}": must be relative`);
    }

    const fullPath = path.join(this.directory, filename);
    if (!fullPath.startsWith(this.directory + path.sep)) {
      throw new Error(`path escapes directory: "${filename}"`);
    }
    return fullPath;
  }
}
