/**
 * 콘텐츠 생성 함수
 *
 * 모든 팩토리는 콘텐츠 객체와 그 배열, 행을 동결(freeze)하여 반환합니다.
 * 생성 이후 id와 연산 목록은 바뀌지 않습니다.
 *
 * @example
 * const table = createTableContent('Sales', rows, {
 *   schema: ['region', 'amount'],
 *   operations: [filter(row => Number(row.amount) > 100), limit(10)],
 * });
 */

import { randomBytes } from 'node:crypto';
import type {
  CellValue,
  Row,
  Operation,
  Content,
  TableContent,
  TextContent,
  TextStyle,
  RawContent,
  SectionContent,
  ChartContent,
  GraphContent,
  GraphEdge,
  DiagramContent,
  CollapsibleSectionContent,
} from '../types';
import { Schema } from './Schema';
import { ValidationError } from './errors';

// =============================================================================
// 옵션 타입
// =============================================================================

/**
 * 공통 생성 옵션
 */
export interface ContentOptions {
  /** 명시적 ID (생략 시 자동 생성) */
  id?: string;

  /** 렌더링 시 실행할 연산 목록 */
  operations?: readonly Operation[];
}

/**
 * 테이블 생성 옵션
 */
export interface TableOptions extends ContentOptions {
  /** 스키마 또는 컬럼 순서 (생략 시 행에서 추론) */
  schema?: Schema | readonly string[];
}

/**
 * 섹션 생성 옵션
 */
export interface SectionOptions extends ContentOptions {
  /** 제목 레벨 (기본값: 0) */
  level?: number;
}

/**
 * 접이식 섹션 생성 옵션
 */
export interface CollapsibleOptions extends SectionOptions {
  /** 기본 펼침 여부 (기본값: false) */
  expanded?: boolean;
}

// =============================================================================
// ID / 행 유틸리티
// =============================================================================

/**
 * 콘텐츠 ID 생성 (`content-<16자리 hex>`)
 */
export function generateContentId(): string {
  return `content-${randomBytes(8).toString('hex')}`;
}

/**
 * 셀 값 복사 (Date는 새 인스턴스)
 */
export function copyValue(value: CellValue): CellValue {
  return value instanceof Date ? new Date(value.getTime()) : value;
}

/**
 * 행 복사
 *
 * 반환된 행을 수정해도 원본에는 영향이 없습니다.
 */
export function copyRow(row: Row): Row {
  const copy: Row = {};
  for (const [key, value] of Object.entries(row)) {
    copy[key] = copyValue(value);
  }
  return copy;
}

function freezeRows(rows: readonly Row[]): readonly Row[] {
  return Object.freeze(rows.map(row => Object.freeze(copyRow(row))));
}

function resolveSchema(schema: Schema | readonly string[] | undefined, rows: readonly Row[]): Schema {
  if (schema instanceof Schema) return schema;
  if (schema) return Schema.fromKeys(schema);
  return Schema.detect(rows);
}

/**
 * 모든 행의 키가 스키마에 정의되어 있는지 확인
 */
function assertRowsMatchSchema(schema: Schema, rows: readonly Row[]): void {
  rows.forEach((row, i) => {
    for (const key of Object.keys(row)) {
      if (!schema.hasField(key)) {
        throw new ValidationError('rows', key, `row ${i} has key "${key}" that is not in the schema`);
      }
    }
  });
}

function baseFields(options: ContentOptions): { id: string; operations: readonly Operation[] } {
  return {
    id: options.id ?? generateContentId(),
    operations: Object.freeze([...(options.operations ?? [])]),
  };
}

// =============================================================================
// 팩토리
// =============================================================================

/**
 * 테이블 콘텐츠 생성
 *
 * @throws ValidationError 행에 스키마 밖의 키가 있는 경우
 */
export function createTableContent(title: string, rows: readonly Row[], options: TableOptions = {}): TableContent {
  const schema = resolveSchema(options.schema, rows);
  assertRowsMatchSchema(schema, rows);

  const content: TableContent = {
    type: 'table',
    ...baseFields(options),
    title,
    schema,
    rows: freezeRows(rows),
  };
  return Object.freeze(content);
}

export function createTextContent(text: string, style: TextStyle = {}, options: ContentOptions = {}): TextContent {
  const content: TextContent = {
    type: 'text',
    ...baseFields(options),
    text,
    style: Object.freeze({ ...style }),
  };
  return Object.freeze(content);
}

/**
 * 특정 포맷 전용 원본 데이터
 *
 * 다른 포맷의 렌더러는 이 콘텐츠를 건너뜁니다.
 */
export function createRawContent(format: string, data: string, options: ContentOptions = {}): RawContent {
  const content: RawContent = {
    type: 'raw',
    ...baseFields(options),
    format,
    data,
  };
  return Object.freeze(content);
}

export function createSectionContent(
  title: string,
  contents: readonly Content[],
  options: SectionOptions = {}
): SectionContent {
  const content: SectionContent = {
    type: 'section',
    ...baseFields(options),
    title,
    level: options.level ?? 0,
    contents: Object.freeze([...contents]),
  };
  return Object.freeze(content);
}

export function createChartContent(
  title: string,
  chartType: string,
  data: readonly Row[],
  options: ContentOptions = {}
): ChartContent {
  const content: ChartContent = {
    type: 'chart',
    ...baseFields(options),
    title,
    chartType,
    data: freezeRows(data),
  };
  return Object.freeze(content);
}

export function createGraphContent(
  title: string,
  edges: readonly GraphEdge[],
  options: ContentOptions = {}
): GraphContent {
  const content: GraphContent = {
    type: 'graph',
    ...baseFields(options),
    title,
    edges: Object.freeze(edges.map(edge => Object.freeze({ ...edge }))),
  };
  return Object.freeze(content);
}

export function createDiagramContent(
  title: string,
  diagramType: string,
  rows: readonly Row[],
  settings: Record<string, CellValue> = {},
  options: ContentOptions = {}
): DiagramContent {
  const content: DiagramContent = {
    type: 'diagram',
    ...baseFields(options),
    title,
    diagramType,
    rows: freezeRows(rows),
    settings: Object.freeze({ ...settings }),
  };
  return Object.freeze(content);
}

export function createCollapsibleSection(
  title: string,
  contents: readonly Content[],
  options: CollapsibleOptions = {}
): CollapsibleSectionContent {
  const content: CollapsibleSectionContent = {
    type: 'collapsible-section',
    ...baseFields(options),
    title,
    level: options.level ?? 0,
    expanded: options.expanded ?? false,
    contents: Object.freeze([...contents]),
  };
  return Object.freeze(content);
}

// =============================================================================
// 파생
// =============================================================================

/**
 * 테이블 콘텐츠 타입 가드
 */
export function isTableContent(content: Content): content is TableContent {
  return content.type === 'table';
}

/**
 * 연산 결과로 새 테이블 콘텐츠 생성
 *
 * id, 제목, 연산 목록은 원본을 따르고 스키마와 행만 교체합니다.
 * 넘겨받은 행은 이미 복사된 것으로 간주하며 동결하지 않습니다.
 */
export function deriveTable(
  content: TableContent,
  changes: { schema?: Schema; rows?: Row[] }
): TableContent {
  return {
    type: 'table',
    id: content.id,
    operations: content.operations,
    title: content.title,
    schema: changes.schema ?? content.schema,
    rows: changes.rows ?? content.rows.map(copyRow),
  };
}
