/**
 * 진행률 표시 테스트
 */

import { describe, it, expect } from 'vitest';
import { NoOpProgress, TextProgress } from '../../../src/output/progress';

function sink(): { lines: string[]; write: (text: string) => void } {
  const lines: string[] = [];
  return {
    lines,
    write: (text: string) => {
      lines.push(text);
    },
  };
}

describe('TextProgress', () => {
  it('상태가 바뀔 때마다 한 줄 출력', () => {
    const out = sink();
    const progress = new TextProgress({ stream: out, prefix: 'docrender' });

    progress.setTotal(2);
    progress.setStatus('rendering json');
    progress.setCurrent(1);
    progress.complete();

    expect(out.lines).toEqual([
      'docrender [0/2]\n',
      'docrender [0/2] rendering json\n',
      'docrender [1/2] rendering json\n',
      'docrender [2/2] complete\n',
    ]);
    expect(progress.isActive()).toBe(false);
  });

  it('실패는 메시지 첫 줄만 출력', () => {
    const out = sink();
    const progress = new TextProgress({ stream: out });

    progress.fail(new Error('render failed with 2 errors:\n  1. boom'));

    expect(out.lines).toEqual(['[0/0] failed: render failed with 2 errors:\n']);
  });

  it('종료 후에는 출력하지 않음', async () => {
    const out = sink();
    const progress = new TextProgress({ stream: out });

    await progress.close();
    progress.setStatus('late');
    progress.increment();
    progress.complete();

    expect(out.lines).toEqual([]);
  });

  it('increment는 현재 값을 증가', () => {
    const out = sink();
    const progress = new TextProgress({ stream: out });

    progress.setTotal(3);
    progress.increment();
    progress.increment(2);

    expect(out.lines.at(-1)).toBe('[3/3]\n');
  });
});

describe('NoOpProgress', () => {
  it('complete 후 비활성', () => {
    const progress = new NoOpProgress();
    progress.setTotal();
    expect(progress.isActive()).toBe(true);
    progress.complete();
    expect(progress.isActive()).toBe(false);
  });
});
