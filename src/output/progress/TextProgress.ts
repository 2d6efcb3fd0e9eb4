/**
 * TextProgress - 줄 단위 텍스트 진행률
 *
 * 상태가 바뀔 때마다 한 줄을 출력합니다.
 *
 * 출력 예:
 * ```
 * docrender [0/4] rendering json
 * docrender [1/4] writing json
 * docrender [4/4] complete
 * ```
 */

import type { Progress } from '../../types';

/**
 * 출력 대상 (process.stderr 등)
 */
export interface LineSink {
  write(text: string): unknown;
}

/**
 * TextProgress 옵션
 */
export interface TextProgressOptions {
  /** 출력 대상 (기본값: process.stderr) */
  stream?: LineSink;

  /** 줄 앞 접두사 */
  prefix?: string;
}

export class TextProgress implements Progress {
  private readonly stream: LineSink;
  private readonly prefix: string;

  private total = 0;
  private current = 0;
  private status = '';
  private active = true;

  constructor(options: TextProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.prefix = options.prefix ?? '';
  }

  // ==========================================================================
  // Progress 구현
  // ==========================================================================

  setTotal(total: number): void {
    this.total = Math.max(0, total);
    this.draw();
  }

  setCurrent(current: number): void {
    this.current = current;
    this.draw();
  }

  increment(delta = 1): void {
    this.current += delta;
    this.draw();
  }

  setStatus(status: string): void {
    this.status = status;
    this.draw();
  }

  complete(): void {
    if (!this.active) return;
    this.current = this.total;
    this.status = 'complete';
    this.draw();
    this.active = false;
  }

  fail(error: Error): void {
    if (!this.active) return;
    const [firstLine = ''] = error.message.split('\n');
    this.status = `failed: ${firstLine}`;
    this.draw();
    this.active = false;
  }

  async close(): Promise<void> {
    this.active = false;
  }

  isActive(): boolean {
    return this.active;
  }

  // ==========================================================================
  // 출력
  // ==========================================================================

  /**
   * 현재 상태를 한 줄로 출력 (종료 후에는 무시)
   */
  private draw(): void {
    if (!this.active) return;

    const parts: string[] = [];
    if (this.prefix) parts.push(this.prefix);
    parts.push(`[${this.current}/${this.total}]`);
    if (this.status) parts.push(this.status);

    this.stream.write(parts.join(' ') + '\n');
  }
}
