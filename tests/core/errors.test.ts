/**
 * 오류 계층 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  CancellationError,
  CallbackError,
  DocRenderError,
  MultiError,
  OperationApplyError,
  RenderError,
  ValidationError,
  WriteError,
  describeComponent,
  invokeCallback,
  isCancellation,
} from '../../src/core/errors';

describe('errors', () => {
  // ===========================================================================
  // 기본 오류
  // ===========================================================================

  describe('기본 오류', () => {
    it('모든 오류는 DocRenderError를 상속하고 code를 가짐', () => {
      const error = new ValidationError('count', -1, 'limit must be a non-negative integer');

      expect(error).toBeInstanceOf(DocRenderError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.name).toBe('ValidationError');
      expect(error.message).toBe('Invalid "count": limit must be a non-negative integer');
    });

    it('파이프라인 오류 메시지는 콘텐츠, 위치, 이름, 원인을 포함', () => {
      const error = new OperationApplyError('sales', 2, 'sort', new Error('column "x" not found'));
      expect(error.message).toBe('content sales: operation 2 (sort) failed to apply: column "x" not found');
      expect(error.operationIndex).toBe(2);
    });

    it('RenderError는 포맷, 렌더러, 바이트 수를 포함', () => {
      const error = new RenderError('json', 'JsonRenderer', new Error('boom'), { outputSize: 12 });
      expect(error.message).toBe('render failed; format=json; renderer=JsonRenderer; output_size=12; cause: boom');
    });

    it('WriteError 메시지', () => {
      const error = new WriteError('file', 'csv', 42, new Error('disk full'));
      expect(error.message).toBe('write error for file writer (format: csv, 42 bytes): disk full');
    });
  });

  // ===========================================================================
  // 콜백 경계
  // ===========================================================================

  describe('invokeCallback', () => {
    it('예외를 CallbackError로 변환', () => {
      const run = () =>
        invokeCallback('predicate', () => {
          throw new Error('bad row');
        });

      expect(run).toThrow(CallbackError);
      expect(run).toThrow('predicate callback threw: bad row');
    });

    it('정상 반환값은 그대로 전달', () => {
      expect(invokeCallback('derive', () => 7)).toBe(7);
    });
  });

  // ===========================================================================
  // MultiError
  // ===========================================================================

  describe('MultiError', () => {
    const writeError = new WriteError('failing', 'json', 10, new Error('disk full'));
    const renderError = new RenderError('csv', 'CsvRenderer', new Error('boom'));

    it('오류가 하나면 한 줄 메시지', () => {
      const error = new MultiError('render', [
        { error: writeError, source: { component: 'writer', details: { format: 'json', writer: 'failing' } } },
      ]);

      expect(error.message).toBe(
        'render: write error for failing writer (format: json, 10 bytes): disk full [component=writer, format=json, writer=failing]'
      );
    });

    it('여러 오류는 번호 목록', () => {
      const error = new MultiError('render', [
        { error: writeError, source: { component: 'writer', details: { format: 'json' } } },
        { error: renderError, source: { component: 'renderer', details: { format: 'csv' } } },
      ]);

      expect(error.message.split('\n')).toEqual([
        'render failed with 2 errors:',
        '  1. write error for failing writer (format: json, 10 bytes): disk full [component=writer, format=json]',
        '  2. render failed; format=csv; renderer=CsvRenderer; cause: boom [component=renderer, format=csv]',
      ]);
      expect(error.size).toBe(2);
    });

    it('bySource로 컴포넌트별 분류', () => {
      const error = new MultiError('render', [
        { error: writeError, source: { component: 'writer', details: {} } },
        { error: renderError, source: { component: 'renderer', details: {} } },
      ]);

      expect(error.bySource('writer')).toEqual([writeError]);
      expect(error.bySource('renderer')).toEqual([renderError]);
      expect(error.bySource('cancellation')).toEqual([]);
      expect(error.errors).toEqual([writeError, renderError]);
    });
  });

  // ===========================================================================
  // 유틸리티
  // ===========================================================================

  describe('유틸리티', () => {
    it('isCancellation은 AbortSignal 사유를 인식', () => {
      const controller = new AbortController();
      controller.abort();
      expect(isCancellation(controller.signal.reason)).toBe(true);
    });

    it('isCancellation은 cause 체인을 따라감', () => {
      const wrapped = new OperationApplyError('c', 0, 'op', new CancellationError('pipeline', 'c', 'stop'));
      expect(isCancellation(wrapped)).toBe(true);
      expect(isCancellation(new Error('plain'))).toBe(false);
    });

    it('describeComponent는 name 속성, 없으면 클래스 이름', () => {
      class PlainWriter {}
      expect(describeComponent({ name: 'custom' })).toBe('custom');
      expect(describeComponent(new PlainWriter())).toBe('PlainWriter');
    });
  });
});
