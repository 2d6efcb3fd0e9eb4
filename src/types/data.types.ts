/**
 * 데이터 타입 정의
 *
 * 테이블 콘텐츠가 다루는 기본 데이터 구조를 정의합니다.
 * 이 타입들은 모든 모듈에서 공통으로 사용됩니다.
 */

// ============================================================================
// 셀 값 타입
// ============================================================================

/**
 * 셀 하나에 들어갈 수 있는 값의 타입
 *
 * @example
 * const name: CellValue = "홍길동";     // 문자열
 * const amount: CellValue = 1200;       // 숫자
 * const paid: CellValue = true;         // 불리언
 * const createdAt: CellValue = new Date(); // 날짜
 * const empty: CellValue = null;        // 빈 값
 */
export type CellValue = string | number | boolean | Date | null | undefined;

// ============================================================================
// 행(Row) 타입
// ============================================================================

/**
 * 한 줄의 데이터 (행)
 *
 * 키는 필드 이름이고 값은 CellValue입니다.
 * 행의 키는 항상 테이블 스키마에 정의된 필드의 부분집합이어야 합니다.
 *
 * @example
 * const row: Row = { region: "Seoul", amount: 1200 };
 */
export interface Row {
  /** 각 필드의 키와 값 */
  [fieldName: string]: CellValue;
}

// ============================================================================
// 필드(Field) 정의
// ============================================================================

/**
 * 필드의 데이터 타입
 *
 * 렌더러가 값의 표현 방식을 결정할 때 참고합니다.
 */
export type FieldType = 'string' | 'number' | 'boolean' | 'date';

/**
 * 셀 값 포맷터
 *
 * 사용자 제공 함수이므로 렌더러는 예외를 잡아 대체 값으로 처리합니다.
 */
export type FieldFormatter = (value: CellValue) => string;

/**
 * 필드 정의
 *
 * @example
 * const fields: FieldDef[] = [
 *   { name: 'region', type: 'string' },
 *   { name: 'amount', type: 'number', formatter: v => `${v}원` },
 *   { name: 'internalId', hidden: true },
 * ];
 */
export interface FieldDef {
  /** 필드 식별자 (Row 객체의 키와 매칭) */
  name: string;

  /** 데이터 타입 (선택적) */
  type?: FieldType;

  /** 셀 값 포맷터 */
  formatter?: FieldFormatter;

  /** 숨김 여부 - 숨긴 필드는 키 순서(keyOrder)에 포함되지 않음 (기본값: false) */
  hidden?: boolean;
}
