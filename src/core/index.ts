/**
 * 코어 모듈
 *
 * 문서/콘텐츠 모델과 오류 계층입니다.
 */

// 문서 모델
export { Document } from './Document';
export { DocumentBuilder } from './DocumentBuilder';
export { Schema } from './Schema';

// 콘텐츠 생성
export {
  createTableContent,
  createTextContent,
  createRawContent,
  createSectionContent,
  createChartContent,
  createGraphContent,
  createDiagramContent,
  createCollapsibleSection,
  generateContentId,
  isTableContent,
  deriveTable,
  copyRow,
  copyValue,
} from './content';
export type { ContentOptions, TableOptions, SectionOptions, CollapsibleOptions } from './content';

// 오류
export {
  DocRenderError,
  ValidationError,
  ConfigurationError,
  CancellationError,
  CallbackError,
  PipelineError,
  OperationValidationError,
  OperationApplyError,
  RenderError,
  TransformError,
  WriteError,
  MultiError,
  invokeCallback,
  isCancellation,
  describeComponent,
  componentType,
  throwIfCancelled,
  toError,
} from './errors';
export type {
  CallbackKind,
  PipelineStage,
  ErrorComponent,
  ErrorSource,
  MultiErrorEntry,
} from './errors';
