import type { Progress } from '../../types';

/**
 * 아무것도 표시하지 않는 Progress (기본값)
 */
export class NoOpProgress implements Progress {
  private active = true;

  setTotal(): void {}
  setCurrent(): void {}
  increment(): void {}
  setStatus(): void {}

  complete(): void {
    this.active = false;
  }

  fail(): void {
    this.active = false;
  }

  async close(): Promise<void> {
    this.active = false;
  }

  isActive(): boolean {
    return this.active;
  }
}
