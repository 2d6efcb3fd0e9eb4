/**
 * Pipeline 모듈 진입점
 */

export { OperationPipeline, applyTransformations } from './OperationPipeline';
export type { PipelineOptions, PipelineResult, PipelineStats, OperationStats } from './OperationPipeline';
