/**
 * Failure Classifier Tests
 */

import { describe, it, expect } from 'vitest';

import {
  classify,
  hintFor,
  RetrievalError,
  GenerationError,
  UnsupportedProviderError,
  MalformedResponseError,
  ValidationError,
  ConfigError,
} from '../index.js';
import { RequestTimeoutError } from '../../utils/deadline.js';

function serviceError(name: string, message = `${name} raised`, extra: Record<string, unknown> = {}): Error {
  return Object.assign(new Error(message), { name, ...extra });
}

describe('classify', () => {
  describe('scenario table', () => {
    it.each([
      ['AccessDeniedException', 'Permission', false],
      ['ThrottlingException', 'Throttled', true],
      ['ResourceNotFoundException', 'NotFound', false],
      ['Foo', 'Unknown', true],
    ] as const)('%s → %s (retryable=%s)', (code, category, retryable) => {
      const classified = classify(serviceError(code), 'retrieval');

      expect(classified.category).toBe(category);
      expect(classified.retryable).toBe(retryable);
    });

    it('treats a connection timeout as transient', () => {
      const timeout = Object.assign(new Error('connect failed 10.0.0.1:443'), { code: 'ETIMEDOUT' });

      expect(classify(timeout, 'generation')).toEqual({
        category: 'Transient',
        retryable: true,
        originalMessage: 'connect failed 10.0.0.1:443',
        sourceComponent: 'generation',
      });
    });
  });

  describe('service codes', () => {
    it('reads namespaced __type codes', () => {
      const error = { __type: 'com.amazon.coral.validate#ValidationException', message: 'bad input' };

      expect(classify(error, 'retrieval').category).toBe('MalformedInput');
    });

    it('reads S3-style Code fields', () => {
      expect(classify({ Code: 'AccessDenied' }, 'diagnostics').category).toBe('Permission');
    });

    it('treats model timeouts as transient', () => {
      expect(classify(serviceError('ModelTimeoutException'), 'generation').category).toBe('Transient');
    });
  });

  describe('fallback signals', () => {
    it.each([
      [403, 'Permission'],
      [429, 'Throttled'],
      [404, 'NotFound'],
      [400, 'MalformedInput'],
      [503, 'Transient'],
    ])('HTTP %i → %s', (status, category) => {
      const error = serviceError('UnmodeledServiceError', 'service said no', {
        $metadata: { httpStatusCode: status },
      });

      expect(classify(error, 'retrieval').category).toBe(category);
    });

    it('uses the SDK retryable hint', () => {
      const throttling = serviceError('Mystery', 'mystery', { $retryable: { throttling: true } });
      const other = serviceError('Mystery', 'mystery', { $retryable: {} });

      expect(classify(throttling, 'retrieval').category).toBe('Throttled');
      expect(classify(other, 'retrieval').category).toBe('Transient');
    });

    it('recognizes timeout wording in plain messages', () => {
      expect(classify('socket hang up', 'generation').category).toBe('Transient');
      expect(classify(new Error('operation timed out'), 'generation').category).toBe('Transient');
    });

    it('treats deadline expiry as transient', () => {
      expect(classify(new RequestTimeoutError(100), 'retrieval')).toMatchObject({
        category: 'Transient',
        originalMessage: 'Request timed out after 100ms',
      });
    });

    it('classifies values that are not errors as unknown', () => {
      expect(classify(undefined, 'retrieval').category).toBe('Unknown');
      expect(classify(42, 'retrieval').originalMessage).toBe('42');
    });
  });

  describe('pipeline errors', () => {
    it('classifies wrappers by their cause', () => {
      const classified = classify(
        new RetrievalError(serviceError('ThrottlingException', 'Rate exceeded')),
        'retrieval'
      );

      expect(classified).toEqual({
        category: 'Throttled',
        retryable: true,
        originalMessage: 'Rate exceeded',
        sourceComponent: 'retrieval',
      });
    });

    it('never retries provider or response mismatches', () => {
      const unsupported = classify(new UnsupportedProviderError('acme.widget-v1'), 'generation');
      const malformed = classify(new MalformedResponseError('meta.llama3-8b-instruct-v1:0'), 'generation');

      expect(unsupported).toMatchObject({ category: 'MalformedInput', retryable: false });
      expect(malformed).toMatchObject({ category: 'MalformedInput', retryable: false });
    });

    it('never retries a request rejected before it was sent', () => {
      expect(classify(new ValidationError('Invalid retrieval request'), 'retrieval')).toEqual({
        category: 'MalformedInput',
        retryable: false,
        originalMessage: 'Invalid retrieval request',
        sourceComponent: 'retrieval',
      });
      expect(classify(new ConfigError('No object store bucket configured'), 'diagnostics')).toMatchObject({
        category: 'MalformedInput',
        retryable: false,
      });
    });

    it('unwraps down to a mismatch error', () => {
      const wrapped = new GenerationError(new MalformedResponseError('m.x'));

      expect(classify(wrapped, 'generation').retryable).toBe(false);
    });
  });
});

describe('hintFor', () => {
  it('maps categories to hints', () => {
    expect(hintFor(classify(serviceError('ResourceNotFoundException'), 'retrieval'))).toBe(
      'Check the knowledge base id, model id and region'
    );
  });
});
