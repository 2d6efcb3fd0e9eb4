/**
 * docrender - 문서 다중 포맷 렌더링 라이브러리
 *
 * 불변 Document를 여러 출력 포맷으로 동시에 렌더링합니다.
 * 각 콘텐츠에 붙은 연산(필터, 정렬, 그룹화 등)은 직렬화 직전에 실행됩니다.
 *
 * @example
 * const doc = new DocumentBuilder()
 *   .table('Sales', rows, { operations: [filter(r => Number(r.amount) > 100), limit(10)] })
 *   .build();
 *
 * await new Output({ formats: [Formats.json()], writers: [stdoutWriter()] }).render(doc);
 */

// 타입 내보내기 (기본 타입)
export * from './types';

// 코어 모듈 내보내기
export * from './core';

// 프로세서 모듈 내보내기
export * from './processor';

// 출력 모듈 내보내기
export * from './output';
