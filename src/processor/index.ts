/**
 * 프로세서 모듈
 *
 * 콘텐츠 연산과 연산 파이프라인입니다.
 */

export * from './operations';
export * from './pipeline';
