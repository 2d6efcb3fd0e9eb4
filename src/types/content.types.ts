/**
 * 콘텐츠 타입 정의
 *
 * Document를 구성하는 콘텐츠 변형(variant)들입니다.
 * `type` 필드로 구분되는 닫힌 유니온이며, 파이프라인은 테이블 형태만 변환하고
 * 나머지는 그대로 통과시킵니다.
 */

import type { Row, CellValue } from './data.types';
import type { Operation } from './operation.types';
import type { Schema } from '../core/Schema';

// ============================================================================
// 공통
// ============================================================================

/**
 * 콘텐츠 종류
 */
export type ContentType =
  | 'table'
  | 'text'
  | 'raw'
  | 'section'
  | 'chart'
  | 'graph'
  | 'diagram'
  | 'collapsible-section';

/**
 * 모든 콘텐츠가 공유하는 필드
 *
 * id와 operations는 생성 시점에 고정되며 이후 변경되지 않습니다.
 */
interface ContentBase<T extends ContentType> {
  /** 콘텐츠 종류 */
  readonly type: T;

  /** 진단 메시지에 쓰이는 안정적인 식별자 */
  readonly id: string;

  /** 렌더링 직전에 순서대로 실행될 연산 목록 */
  readonly operations: readonly Operation[];
}

// ============================================================================
// 변형별 정의
// ============================================================================

/**
 * 테이블 콘텐츠
 *
 * 스키마의 keyOrder가 컬럼 순서를 결정합니다.
 */
export interface TableContent extends ContentBase<'table'> {
  readonly title: string;
  readonly schema: Schema;
  readonly rows: readonly Row[];
}

/**
 * 텍스트 스타일
 */
export interface TextStyle {
  bold?: boolean;
  italic?: boolean;
  /** 포맷별로 해석되는 색상 이름 */
  color?: string;
  size?: number;
  /** 헤더 텍스트 여부 */
  header?: boolean;
}

export interface TextContent extends ContentBase<'text'> {
  readonly text: string;
  readonly style: Readonly<TextStyle>;
}

/**
 * 특정 포맷 전용 원본 데이터 (예: html 조각)
 */
export interface RawContent extends ContentBase<'raw'> {
  readonly format: string;
  readonly data: string;
}

export interface SectionContent extends ContentBase<'section'> {
  readonly title: string;
  /** 제목 레벨 (0 = 최상위) */
  readonly level: number;
  readonly contents: readonly Content[];
}

/**
 * 차트 콘텐츠
 *
 * 차트 종류별 데이터는 행 목록으로 표현합니다 (예: pie → { label, value }).
 */
export interface ChartContent extends ContentBase<'chart'> {
  readonly title: string;
  readonly chartType: string;
  readonly data: readonly Row[];
}

/**
 * 그래프 간선
 */
export interface GraphEdge {
  readonly from: string;
  readonly to: string;
  readonly label?: string;
}

export interface GraphContent extends ContentBase<'graph'> {
  readonly title: string;
  readonly edges: readonly GraphEdge[];
}

/**
 * 다이어그램 콘텐츠 (draw.io 등 외부 도구용 레코드 + 설정)
 */
export interface DiagramContent extends ContentBase<'diagram'> {
  readonly title: string;
  readonly diagramType: string;
  readonly rows: readonly Row[];
  readonly settings: Readonly<Record<string, CellValue>>;
}

export interface CollapsibleSectionContent extends ContentBase<'collapsible-section'> {
  readonly title: string;
  readonly level: number;
  /** 기본 펼침 여부 */
  readonly expanded: boolean;
  readonly contents: readonly Content[];
}

// ============================================================================
// 유니온
// ============================================================================

/**
 * Document를 구성하는 콘텐츠 하나
 */
export type Content =
  | TableContent
  | TextContent
  | RawContent
  | SectionContent
  | ChartContent
  | GraphContent
  | DiagramContent
  | CollapsibleSectionContent;
