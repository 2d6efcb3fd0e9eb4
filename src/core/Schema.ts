/**
 * Schema - 테이블 컬럼 스키마
 *
 * 필드 정의 목록과 키 순서(keyOrder)를 보관합니다.
 * 키 순서는 컬럼을 명시적으로 재배치하는 연산(GroupBy 등)이 아니면
 * 모든 연산을 거쳐도 그대로 유지되어야 합니다.
 *
 * 스키마는 불변입니다. 변경 메서드는 항상 새 스키마를 반환합니다.
 *
 * @example
 * const schema = Schema.fromKeys(['region', 'amount']);
 * const withTax = schema.withField({ name: 'tax', type: 'number' });
 * withTax.keyOrder; // ['region', 'amount', 'tax']
 */

import type { FieldDef, Row } from '../types';
import { ValidationError } from './errors';

// =============================================================================
// Schema 클래스
// =============================================================================

export class Schema {
  /** 필드 정의 목록 (숨김 필드 포함) */
  readonly fields: readonly Readonly<FieldDef>[];

  /** 표시 컬럼 순서 (숨김 필드 제외) */
  readonly keyOrder: readonly string[];

  /** 이름 → 필드 인덱스 */
  private readonly fieldIndex: ReadonlyMap<string, number>;

  private constructor(fields: FieldDef[]) {
    const index = new Map<string, number>();
    fields.forEach((field, i) => {
      if (field.name === '') {
        throw new ValidationError('fields', fields, 'field name must not be empty');
      }
      if (index.has(field.name)) {
        throw new ValidationError('fields', field.name, `duplicate field "${field.name}"`);
      }
      index.set(field.name, i);
    });

    this.fields = Object.freeze(fields.map(field => Object.freeze({ ...field })));
    this.keyOrder = Object.freeze(fields.filter(field => !field.hidden).map(field => field.name));
    this.fieldIndex = index;
    Object.freeze(this);
  }

  // ==========================================================================
  // 생성
  // ==========================================================================

  /**
   * 컬럼 이름 목록으로 스키마 생성
   */
  static fromKeys(keys: readonly string[]): Schema {
    return new Schema(keys.map(name => ({ name })));
  }

  /**
   * 필드 정의 목록으로 스키마 생성
   *
   * hidden 필드는 keyOrder에서 제외됩니다.
   */
  static fromFields(fields: readonly FieldDef[]): Schema {
    return new Schema([...fields]);
  }

  /**
   * 행 목록에서 스키마 추론
   *
   * 처음 등장한 순서대로 키를 수집합니다.
   * 객체 키 순서에 의존하므로 순서가 중요하면 fromKeys를 사용하세요.
   */
  static detect(rows: readonly Row[]): Schema {
    const seen = new Set<string>();
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        seen.add(key);
      }
    }
    return Schema.fromKeys([...seen]);
  }

  // ==========================================================================
  // 조회
  // ==========================================================================

  /**
   * 키 순서 복사본 반환
   */
  getKeyOrder(): string[] {
    return [...this.keyOrder];
  }

  /**
   * 필드 존재 여부 (숨김 필드 포함)
   */
  hasField(name: string): boolean {
    return this.fieldIndex.has(name);
  }

  /**
   * 필드 정의 조회
   */
  findField(name: string): Readonly<FieldDef> | undefined {
    const index = this.fieldIndex.get(name);
    return index === undefined ? undefined : this.fields[index];
  }

  /** 필드 개수 */
  get size(): number {
    return this.fields.length;
  }

  // ==========================================================================
  // 파생
  // ==========================================================================

  /**
   * 필드를 추가한 새 스키마 반환
   *
   * @param position - keyOrder 기준 삽입 위치 (생략하거나 범위를 넘으면 끝에 추가)
   */
  withField(field: FieldDef, position?: number): Schema {
    const fields = [...this.fields];

    if (position === undefined || position >= this.keyOrder.length) {
      fields.push(field);
      return new Schema(fields);
    }

    // 표시 컬럼 기준 위치를 전체 필드 배열 인덱스로 변환
    const anchor = this.keyOrder[position];
    const insertAt = anchor === undefined ? fields.length : (this.fieldIndex.get(anchor) ?? fields.length);
    fields.splice(insertAt, 0, field);
    return new Schema(fields);
  }
}
