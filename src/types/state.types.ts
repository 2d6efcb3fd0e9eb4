/**
 * 연산 설정 타입 정의
 *
 * 정렬, 필터링, 그룹화 연산이 받는 선언적 설정들입니다.
 */

import type { CellValue, Row } from './data.types';

// ============================================================================
// 정렬
// ============================================================================

/**
 * 정렬 방향
 */
export type SortDirection = 'asc' | 'desc';

/**
 * 정렬 키
 *
 * 어떤 컬럼을 어떤 방향으로 정렬할지 나타냅니다.
 *
 * @example
 * const key: SortKey = { columnKey: 'amount', direction: 'desc' };
 */
export interface SortKey {
  /** 정렬할 컬럼의 키 */
  columnKey: string;

  /** 정렬 방향 */
  direction: SortDirection;
}

/**
 * 커스텀 행 비교 함수 (음수: a가 먼저, 0: 같음, 양수: b가 먼저)
 */
export type RowComparator = (a: Row, b: Row) => number;

// ============================================================================
// 필터
// ============================================================================

/**
 * 필터 연산자
 *
 * - eq / neq: 같음 / 같지 않음
 * - gt / gte / lt / lte: 숫자 비교
 * - contains / notContains / startsWith / endsWith: 문자열 (대소문자 무시)
 * - between: [min, max] 범위 내 (숫자)
 * - isNull / isNotNull: 빈 값 여부
 */
export type FilterOperator =
  | 'eq'
  | 'neq'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'contains'
  | 'notContains'
  | 'startsWith'
  | 'endsWith'
  | 'between'
  | 'isNull'
  | 'isNotNull';

/**
 * 선언적 필터 조건
 *
 * @example
 * const condition: FilterCondition = { columnKey: 'amount', operator: 'gte', value: 100 };
 */
export interface FilterCondition {
  /** 필터링할 컬럼 키 */
  columnKey: string;

  /** 비교 연산자 */
  operator: FilterOperator;

  /** 비교 값 (between은 [min, max]) */
  value?: CellValue | [number, number];
}

/**
 * 행 조건자 (true면 행 유지)
 */
export type RowPredicate = (row: Row) => boolean;

// ============================================================================
// 집계
// ============================================================================

/**
 * 내장 집계 함수 종류
 */
export type AggregateType = 'count' | 'sum' | 'avg' | 'min' | 'max' | 'first' | 'last';

/**
 * 내장 집계 설정
 *
 * columnKey가 없는 count는 그룹의 행 수를 셉니다.
 */
export interface AggregateField {
  /** 집계 함수 */
  function: AggregateType;

  /** 대상 컬럼 키 */
  columnKey?: string;
}

/**
 * 커스텀 집계 함수
 */
export type CustomAggregateFunction = (rows: readonly Row[]) => CellValue;

/**
 * 집계 함수 (내장 또는 커스텀)
 */
export type AggregateFn = AggregateField | CustomAggregateFunction;

/**
 * 파생 컬럼 계산 함수
 */
export type DeriveFunction = (row: Row) => CellValue;
