/**
 * 타입 정의 모듈
 *
 * 모든 모듈에서 공유하는 타입들을 정의합니다.
 *
 * @example
 * import type { Row, Content, Operation, Writer } from '../types';
 */

// 데이터 타입
export type { CellValue, Row, FieldType, FieldFormatter, FieldDef } from './data.types';

// 연산 설정 타입
export type {
  SortDirection,
  SortKey,
  RowComparator,
  FilterOperator,
  FilterCondition,
  RowPredicate,
  AggregateType,
  AggregateField,
  CustomAggregateFunction,
  AggregateFn,
  DeriveFunction,
} from './state.types';

// 콘텐츠 타입
export type {
  ContentType,
  Content,
  TableContent,
  TextStyle,
  TextContent,
  RawContent,
  SectionContent,
  ChartContent,
  GraphEdge,
  GraphContent,
  DiagramContent,
  CollapsibleSectionContent,
} from './content.types';

// 연산 타입
export type { Operation, OperationContext } from './operation.types';

// 출력 타입
export type {
  RenderSink,
  Renderer,
  Format,
  Writer,
  Transformer,
  Progress,
} from './output.types';
