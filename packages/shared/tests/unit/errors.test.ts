/**
 * Unit tests for error classes
 */

import { describe, it, expect } from 'vitest';

import {
  PrepullError,
  ErrorCode,
  ConfigError,
  SourceUnavailableError,
  PullFailedError,
  ClusterApiError,
  isPrepullError,
  isConfigError,
  isSourceUnavailableError,
  isPullFailedError,
  isClusterApiError,
  wrapError,
  errorMessage,
} from '../../src/errors';

describe('Errors', () => {
  describe('PrepullError', () => {
    it('should map codes to HTTP status', () => {
      expect(new PrepullError('x', ErrorCode.NOT_FOUND).statusCode).toBe(404);
      expect(new PrepullError('x', ErrorCode.ALREADY_EXISTS).statusCode).toBe(409);
      expect(new PrepullError('x', ErrorCode.INVALID_INPUT).statusCode).toBe(400);
      expect(new PrepullError('x', ErrorCode.SOURCE_UNAVAILABLE).statusCode).toBe(502);
      expect(new PrepullError('x', ErrorCode.CLUSTER_API_ERROR).statusCode).toBe(502);
      expect(new PrepullError('x', ErrorCode.PULL_TIMEOUT).statusCode).toBe(500);
      expect(new PrepullError('x').statusCode).toBe(500);
    });

    it('should classify client and server errors', () => {
      const notFound = new PrepullError('missing', ErrorCode.NOT_FOUND);
      expect(notFound.isClientError()).toBe(true);
      expect(notFound.isServerError()).toBe(false);
    });

    it('should serialize with correlation id', () => {
      const error = new PrepullError('boom', ErrorCode.INTERNAL, { resourceId: 'p' }).withCorrelationId('abc');
      const json = error.toJSON();
      expect(json.error).toMatchObject({
        name: 'PrepullError',
        code: ErrorCode.INTERNAL,
        message: 'boom',
        meta: { resourceId: 'p' },
        correlationId: 'abc',
      });
    });

    it('should include the cause message in log output', () => {
      const error = new PrepullError('outer', ErrorCode.INTERNAL, {}, new Error('inner'));
      expect(error.toLog().cause).toBe('inner');
    });
  });

  describe('wrapError', () => {
    it('should return prepull errors unchanged', () => {
      const original = new ConfigError('bad');
      expect(wrapError(original)).toBe(original);
    });

    it('should wrap plain errors with the given code', () => {
      const wrapped = wrapError(new Error('nope'), ErrorCode.INTERNAL);
      expect(wrapped.code).toBe(ErrorCode.INTERNAL);
      expect(wrapped.message).toBe('nope');
      expect(wrapped.cause?.message).toBe('nope');
    });

    it('should wrap thrown strings', () => {
      expect(wrapError('plain').message).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });

  describe('ConfigError', () => {
    it('should build field errors', () => {
      const error = ConfigError.field('repo', 'Repository is required', 'required');
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(error.details).toEqual([{ field: 'repo', message: 'Repository is required', rule: 'required' }]);
      expect(isConfigError(error)).toBe(true);
      expect(isPrepullError(error)).toBe(true);
    });

    it('should include details in JSON', () => {
      const error = ConfigError.required('name');
      expect(error.message).toBe('Missing required field: name');
      expect(error.toJSON().error).toMatchObject({
        code: ErrorCode.MISSING_REQUIRED_FIELD,
        details: [{ field: 'name', message: 'This field is required', rule: 'required' }],
      });
    });
  });

  describe('SourceUnavailableError', () => {
    it('should describe HTTP failures', () => {
      const error = SourceUnavailableError.unreachable('lsstsqre/sciplat-lab', undefined, 503);
      expect(error.message).toBe('Registry request failed for lsstsqre/sciplat-lab (HTTP 503)');
      expect(error.code).toBe(ErrorCode.REGISTRY_UNREACHABLE);
      expect(error.isRetryable()).toBe(true);
      expect(isSourceUnavailableError(error)).toBe(true);
    });

    it('should describe transport failures', () => {
      const error = SourceUnavailableError.unreachable('repo', new Error('ECONNREFUSED'));
      expect(error.message).toBe('Registry request failed for repo: ECONNREFUSED');
    });

    it('should describe auth failures', () => {
      const error = SourceUnavailableError.authFailed('repo', 'token endpoint returned 401');
      expect(error.message).toBe('Registry authentication failed for repo: token endpoint returned 401');
      expect(error.code).toBe(ErrorCode.REGISTRY_AUTH_FAILED);
    });
  });

  describe('PullFailedError', () => {
    it('should carry a reason and matching code', () => {
      const error = PullFailedError.timedOut('docker.io/library/alpine:3.19', 1, 3, 1000);
      expect(error.reason).toBe('timeout');
      expect(error.code).toBe(ErrorCode.PULL_TIMEOUT);
      expect(error.message).toBe('Pull of docker.io/library/alpine:3.19 timed out after 1000ms (1/3 nodes ready)');
      expect(isPullFailedError(error)).toBe(true);
    });

    it('should report cancellation as not retryable', () => {
      const error = PullFailedError.cancelled('alpine');
      expect(error.code).toBe(ErrorCode.PULL_CANCELLED);
      expect(error.isRetryable()).toBe(false);
    });

    it('should keep the create cause', () => {
      const error = PullFailedError.createFailed('alpine', 'prepull-a-1', new Error('forbidden'));
      expect(error.message).toBe('Failed to create pull workload prepull-a-1: forbidden');
      expect(error.reason).toBe('create');
      expect(error.meta.workloadName).toBe('prepull-a-1');
    });
  });

  describe('ClusterApiError', () => {
    it('should wrap thrown values', () => {
      const error = ClusterApiError.from('listNodes', new Error('connection reset'));
      expect(error.message).toBe('Cluster API listNodes failed: connection reset');
      expect(error.operation).toBe('listNodes');
      expect(isClusterApiError(error)).toBe(true);
    });

    it('should not double wrap', () => {
      const inner = new ClusterApiError('deleteWorkload', 'gone', 404);
      expect(ClusterApiError.from('other', inner)).toBe(inner);
      expect(inner.isNotFound()).toBe(true);
    });
  });
});
