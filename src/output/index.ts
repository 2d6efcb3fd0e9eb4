/**
 * 출력 모듈
 *
 * 렌더링 오케스트레이터와 기본 제공 Renderer / Writer / Transformer / Progress입니다.
 */

export { Output } from './Output';
export type { OutputOptions, RenderOptions } from './Output';
export { validateOutputConfig, outputConfigSchema } from './config';
export type { OutputConfig } from './config';

export * from './renderers';
export * from './writers';
export * from './transformers';
export * from './progress';
