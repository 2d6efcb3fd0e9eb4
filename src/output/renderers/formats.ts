/**
 * 내장 출력 포맷
 *
 * @example
 * const output = new Output({
 *   formats: [Formats.json(), Formats.markdown()],
 *   writers: [new FileWriter('./out')],
 * });
 */

import type { Format } from '../../types';
import type { RendererOptions } from './BaseRenderer';
import { JsonRenderer } from './JsonRenderer';
import { YamlRenderer } from './YamlRenderer';
import { CsvRenderer } from './CsvRenderer';
import { MarkdownRenderer } from './MarkdownRenderer';

export const Formats = {
  json: (options?: RendererOptions): Format => ({ name: 'json', renderer: new JsonRenderer(options) }),
  yaml: (options?: RendererOptions): Format => ({ name: 'yaml', renderer: new YamlRenderer(options) }),
  csv: (options?: RendererOptions): Format => ({ name: 'csv', renderer: new CsvRenderer(options) }),
  markdown: (options?: RendererOptions): Format => ({ name: 'markdown', renderer: new MarkdownRenderer(options) }),
} as const;

/**
 * 포맷 이름 → 파일 확장자
 */
export const FORMAT_EXTENSIONS: Readonly<Record<string, string>> = {
  json: 'json',
  yaml: 'yaml',
  csv: 'csv',
  markdown: 'md',
  html: 'html',
  table: 'txt',
  dot: 'dot',
  mermaid: 'mmd',
  drawio: 'csv',
};
