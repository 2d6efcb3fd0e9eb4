/**
 * 셀 값 비교
 *
 * Sort 연산이 사용하는 전순서(total order)입니다.
 *
 * 먼저 타입 순위로 비교합니다:
 * null / undefined < 숫자 < 문자열 < 불리언 < 날짜
 *
 * 같은 타입끼리는 숫자는 수치(NaN은 가장 뒤), 문자열은 코드 유닛,
 * 불리언은 false < true, 날짜는 시각(유효하지 않은 날짜는 가장 뒤)으로 비교합니다.
 */

import type { CellValue } from '../../types';

/**
 * 빈 값 여부
 */
export function isNullish(value: CellValue): value is null | undefined {
  return value === null || value === undefined;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareNumbers(a: number, b: number): number {
  const aIsNaN = Number.isNaN(a);
  const bIsNaN = Number.isNaN(b);
  if (aIsNaN || bIsNaN) {
    return Number(aIsNaN) - Number(bIsNaN);
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * 타입 순위
 */
function typeRank(value: CellValue): number {
  if (isNullish(value)) return 0;
  if (typeof value === 'number') return 1;
  if (typeof value === 'string') return 2;
  if (typeof value === 'boolean') return 3;
  return 4;
}

/**
 * 두 값 비교 (오름차순 기준)
 */
export function compareValues(a: CellValue, b: CellValue): number {
  const rankDiff = typeRank(a) - typeRank(b);
  if (rankDiff !== 0) return rankDiff;

  if (typeof a === 'number' && typeof b === 'number') {
    return compareNumbers(a, b);
  }

  if (typeof a === 'string' && typeof b === 'string') {
    return compareStrings(a, b);
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return (a ? 1 : 0) - (b ? 1 : 0);
  }

  if (a instanceof Date && b instanceof Date) {
    return compareNumbers(a.getTime(), b.getTime());
  }

  // 둘 다 빈 값
  return 0;
}
