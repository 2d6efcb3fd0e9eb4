export { BaseRenderer } from './BaseRenderer';
export type { RendererOptions, FormatErrorHandler, PlainValue } from './BaseRenderer';
export { JsonRenderer } from './JsonRenderer';
export { YamlRenderer } from './YamlRenderer';
export { CsvRenderer } from './CsvRenderer';
export { MarkdownRenderer } from './MarkdownRenderer';
export { Formats, FORMAT_EXTENSIONS } from './formats';
