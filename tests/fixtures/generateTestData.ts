/**
 * 테스트 데이터 생성 유틸리티
 *
 * 요청한 개수만큼 결정적인(deterministic) 판매 데이터를 생성합니다.
 * 같은 인자로 호출하면 항상 같은 결과를 반환합니다.
 *
 * @example
 * import { generateSalesRows } from './generateTestData';
 * const rows = generateSalesRows(100);
 */

import type { Row } from '../../src/types';

// =============================================================================
// 타입 정의
// =============================================================================

export interface SalesRow extends Row {
  id: number;
  region: string;
  product: string;
  amount: number;
  paid: boolean;
}

// =============================================================================
// 샘플 데이터 풀
// =============================================================================

const REGIONS = ['Seoul', 'Busan', 'Incheon', 'Daegu'];

const PRODUCTS = ['Keyboard', 'Mouse', 'Monitor', 'Cable', 'Stand'];

// =============================================================================
// 생성 함수
// =============================================================================

/**
 * 판매 데이터 생성
 *
 * - region: REGIONS를 순환
 * - product: PRODUCTS를 순환
 * - amount: (i * 37) % 1000 + 10
 * - paid: 짝수 id만 true
 */
export function generateSalesRows(count: number): SalesRow[] {
  const rows: SalesRow[] = [];
  for (let i = 0; i < count; i++) {
    rows.push({
      id: i + 1,
      region: REGIONS[i % REGIONS.length] ?? 'Seoul',
      product: PRODUCTS[i % PRODUCTS.length] ?? 'Keyboard',
      amount: ((i * 37) % 1000) + 10,
      paid: (i + 1) % 2 === 0,
    });
  }
  return rows;
}

/**
 * 판매 데이터 컬럼 순서
 */
export const SALES_KEYS = ['id', 'region', 'product', 'amount', 'paid'];
