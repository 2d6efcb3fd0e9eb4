/**
 * 렌더러 테스트 (JSON / YAML / CSV / Markdown)
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { JsonRenderer, YamlRenderer, CsvRenderer, MarkdownRenderer } from '../../../src/output/renderers';
import { DocumentBuilder } from '../../../src/core/DocumentBuilder';
import { Document } from '../../../src/core/Document';
import { Schema } from '../../../src/core/Schema';
import { createTableContent, createTextContent } from '../../../src/core/content';
import { CallbackError, CancellationError, OperationApplyError, RenderError } from '../../../src/core/errors';
import { limit, sortBy } from '../../../src/processor/operations';
import type { CellValue } from '../../../src/types';

function text(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('utf8');
}

afterEach(() => {
  vi.restoreAllMocks();
});

// =============================================================================
// JSON
// =============================================================================

describe('JsonRenderer', () => {
  it('콘텐츠가 하나면 객체', async () => {
    const doc = new DocumentBuilder().text('hi').build();
    const output = text(await new JsonRenderer().render(doc));

    expect(output).toBe('{\n  "type": "text",\n  "text": "hi"\n}\n');
  });

  it('콘텐츠가 여러 개면 배열', async () => {
    const doc = new DocumentBuilder().text('a').table('T', [{ n: 1 }]).build();
    const parsed: unknown = JSON.parse(text(await new JsonRenderer().render(doc)));

    expect(parsed).toEqual([
      { type: 'text', text: 'a' },
      { type: 'table', title: 'T', columns: ['n'], rows: [{ n: 1 }] },
    ]);
  });

  it('섹션 하위 콘텐츠에도 연산 적용', async () => {
    const doc = new DocumentBuilder()
      .section('S', b => b.table('T', [{ n: 1 }, { n: 2 }], { operations: [limit(1)] }), { level: 1 })
      .build();
    const parsed: unknown = JSON.parse(text(await new JsonRenderer().render(doc)));

    expect(parsed).toEqual({
      type: 'section',
      title: 'S',
      level: 1,
      contents: [{ type: 'table', title: 'T', columns: ['n'], rows: [{ n: 1 }] }],
    });
  });

  it('날짜는 ISO 문자열, undefined는 null', async () => {
    const doc = new Document([
      createTableContent('T', [{ at: new Date('2024-01-02T03:04:05.000Z'), note: undefined }], {
        schema: ['at', 'note'],
      }),
    ]);
    const parsed: unknown = JSON.parse(text(await new JsonRenderer().render(doc)));

    expect(parsed).toEqual({
      type: 'table',
      title: 'T',
      columns: ['at', 'note'],
      rows: [{ at: '2024-01-02T03:04:05.000Z', note: null }],
    });
  });

  it('supportsStreaming은 false', () => {
    expect(new JsonRenderer().supportsStreaming()).toBe(false);
  });
});

// =============================================================================
// YAML
// =============================================================================

describe('YamlRenderer', () => {
  it('콘텐츠마다 YAML 문서를 --- 로 구분', async () => {
    const doc = new DocumentBuilder().text('hi').text('bye').build();
    const output = text(await new YamlRenderer().render(doc));

    expect(output).toBe('type: text\ntext: hi\n---\ntype: text\ntext: bye\n');
  });

  it('텍스트 스타일 포함', async () => {
    const doc = new DocumentBuilder().header('Title').build();
    const output = text(await new YamlRenderer().render(doc));

    expect(output).toBe('type: text\ntext: Title\nstyle:\n  header: true\n  bold: true\n');
  });
});

// =============================================================================
// CSV
// =============================================================================

describe('CsvRenderer', () => {
  it('테이블을 헤더와 행으로 출력', async () => {
    const doc = new DocumentBuilder()
      .table('Items', [{ id: 1, name: 'pen' }, { id: 2, name: 'ink' }], { schema: ['id', 'name'] })
      .build();
    const output = text(await new CsvRenderer().render(doc));

    expect(output.split('\n')).toEqual(['id,name', '1,pen', '2,ink', '']);
  });

  it('테이블이 아닌 콘텐츠는 건너뜀', async () => {
    const doc = new DocumentBuilder().text('intro').table('T', [{ x: 'a' }]).build();
    const output = text(await new CsvRenderer().render(doc));

    expect(output).toBe('x\na\n');
  });

  it('연산 적용 후 출력', async () => {
    const doc = new DocumentBuilder()
      .table('T', [{ n: 1 }, { n: 3 }, { n: 2 }], { operations: [sortBy({ columnKey: 'n', direction: 'desc' })] })
      .build();
    const output = text(await new CsvRenderer().render(doc));

    expect(output).toBe('n\n3\n2\n1\n');
  });

  it('텍스트만 있는 문서는 빈 출력', async () => {
    const doc = new DocumentBuilder().text('only text').build();
    expect((await new CsvRenderer().render(doc)).length).toBe(0);
  });
});

// =============================================================================
// Markdown
// =============================================================================

describe('MarkdownRenderer', () => {
  it('헤더와 굵은 텍스트', async () => {
    const doc = new DocumentBuilder().header('Report').text('note', { bold: true }).build();
    const output = text(await new MarkdownRenderer().render(doc));

    expect(output).toBe('## Report\n\n**note**\n');
  });

  it('그래프는 간선 목록', async () => {
    const doc = new DocumentBuilder().graph('Deps', [{ from: 'a', to: 'b', label: 'uses' }, { from: 'b', to: 'c' }]).build();
    const output = text(await new MarkdownRenderer().render(doc));

    expect(output).toBe('### Deps\n\n- a -> b (uses)\n- b -> c\n');
  });

  it('접이식 섹션은 details 요소', async () => {
    const doc = new DocumentBuilder()
      .collapsibleSection('More', b => b.text('inside'), { expanded: true })
      .build();
    const output = text(await new MarkdownRenderer().render(doc));

    expect(output).toBe('<details open>\n<summary>More</summary>\n\ninside\n\n</details>\n');
  });

  it('다른 포맷 전용 raw 콘텐츠는 건너뜀', async () => {
    const doc = new DocumentBuilder().raw('html', '<b>x</b>').raw('markdown', '> quote').build();
    const output = text(await new MarkdownRenderer().render(doc));

    expect(output).toBe('> quote\n');
  });

  it('테이블은 제목과 함께 출력', async () => {
    const doc = new DocumentBuilder().table('Sales', [{ item: 'pen' }]).build();
    const output = text(await new MarkdownRenderer().render(doc));

    expect(output.startsWith('### Sales\n\n')).toBe(true);
    expect(output).toContain('pen');
  });
});

// =============================================================================
// 공통 동작
// =============================================================================

describe('BaseRenderer', () => {
  const schema = Schema.fromFields([
    {
      name: 'price',
      formatter: (value: CellValue) => {
        if (value === 2) throw new Error('bad');
        return `$${String(value)}`;
      },
    },
  ]);
  const document = new Document([createTableContent('P', [{ price: 1 }, { price: 2 }], { id: 'content-f', schema })]);

  it('포맷터 예외는 원래 값으로 대체하고 처리기에 알림', async () => {
    const reports: Array<{ message: string; contentId: string; field: string }> = [];
    const renderer = new JsonRenderer({
      onFormatError: (error, details) => {
        reports.push({ message: error.message, ...details });
      },
    });

    const parsed: unknown = JSON.parse(text(await renderer.render(document)));

    expect(parsed).toEqual({ type: 'table', title: 'P', columns: ['price'], rows: [{ price: '$1' }, { price: 2 }] });
    expect(reports).toEqual([{ message: 'formatter callback threw: bad', contentId: 'content-f', field: 'price' }]);
  });

  it('처리기가 없으면 console.warn', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await new JsonRenderer().render(document);

    expect(warn).toHaveBeenCalledWith(
      'JsonRenderer: formatter for "price" in content content-f failed: formatter callback threw: bad'
    );
  });

  it('처리기에는 CallbackError 전달', async () => {
    let received: unknown;
    await new CsvRenderer({ onFormatError: error => { received = error; } }).render(document);
    expect(received).toBeInstanceOf(CallbackError);
  });

  it('이미 취소된 신호면 CancellationError', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(new JsonRenderer().render(document, controller.signal)).rejects.toBeInstanceOf(CancellationError);
  });

  it('연산 실패는 콘텐츠 ID와 출력 크기를 담은 RenderError', async () => {
    const doc = new Document([
      createTextContent('a'),
      createTableContent('T', [{ n: 1 }], { id: 'content-x', operations: [sortBy({ columnKey: 'missing', direction: 'asc' })] }),
    ]);

    const error = await new JsonRenderer().render(doc).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RenderError);
    if (!(error instanceof RenderError)) return;
    expect(error.contentId).toBe('content-x');
    // '[\n' + 첫 텍스트 콘텐츠 JSON
    expect(error.outputSize).toBe(37);
    expect(error.cause).toBeInstanceOf(OperationApplyError);
  });

  it('구분자 옵션', async () => {
    const doc = new DocumentBuilder().text('a').text('b').build();
    const output = text(await new MarkdownRenderer({ separator: '---\n' }).render(doc));

    expect(output).toBe('a\n---\nb\n');
  });
});
