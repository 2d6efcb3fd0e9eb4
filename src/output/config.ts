/**
 * Output 설정 검증
 *
 * render() 시작 시점의 설정 스냅샷을 zod 스키마로 검증합니다.
 * 위반 사항은 모두 모아 하나의 ConfigurationError로 던집니다.
 */

import { z } from 'zod';
import type { Format, Progress, Renderer, Transformer, Writer } from '../types';
import { ConfigurationError } from '../core/errors';

// =============================================================================
// 타입
// =============================================================================

/**
 * 렌더링 한 번에 사용되는 설정 스냅샷
 */
export interface OutputConfig {
  formats: Format[];
  writers: Writer[];
  transformers: Transformer[];
  progress: Progress;
}

// =============================================================================
// 스키마
// =============================================================================

function hasMethods(value: unknown, ...methods: string[]): boolean {
  if (typeof value !== 'object' || value === null) return false;
  return methods.every(method => typeof Reflect.get(value, method) === 'function');
}

const rendererSchema = z.custom<Renderer>(
  value => hasMethods(value, 'render', 'renderTo', 'supportsStreaming'),
  { message: 'renderer must implement render(), renderTo() and supportsStreaming()' }
);

const formatSchema = z.object({
  name: z.string().min(1, 'format name must not be empty'),
  renderer: rendererSchema,
});

const writerSchema = z.custom<Writer>(value => hasMethods(value, 'write'), {
  message: 'writer must implement write()',
});

const transformerSchema = z
  .custom<Transformer>(value => hasMethods(value, 'canTransform', 'transform'), {
    message: 'transformer must implement canTransform() and transform()',
  })
  .pipe(
    z
      .object({
        name: z.string().min(1, 'transformer name must not be empty'),
        priority: z.number().finite('transformer priority must be a finite number'),
      })
      .passthrough()
  );

const progressSchema = z.custom<Progress>(
  value => hasMethods(value, 'setTotal', 'setCurrent', 'setStatus', 'complete', 'fail'),
  { message: 'progress must implement the Progress interface' }
);

export const outputConfigSchema = z.object({
  formats: z.array(formatSchema).min(1, 'at least one format is required'),
  writers: z.array(writerSchema).min(1, 'at least one writer is required'),
  transformers: z.array(transformerSchema),
  progress: progressSchema,
});

// =============================================================================
// 검증
// =============================================================================

/**
 * 설정 검증
 *
 * @throws ConfigurationError 위반 사항이 하나라도 있는 경우
 */
export function validateOutputConfig(config: OutputConfig): void {
  const result = outputConfigSchema.safeParse(config);
  if (result.success) return;

  const issues = result.error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  throw new ConfigurationError(issues);
}
