/**
 * Error classes tests
 */

import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  NotFoundError,
  SessionBusyError,
  DiscoveryError,
  CatalogNotInitializedError,
  OracleError,
  TimeoutError,
  InternalError,
  UnknownToolError,
  ToolInvocationError,
  isAppError,
  errorMessage,
} from '../../utils/errors.js';

describe('Error Classes', () => {
  describe('AppError', () => {
    it('should have correct properties', () => {
      const error = new ValidationError('Test error');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(400);
      expect(error.retryable).toBe(false);
    });

    it('should generate correct response', () => {
      const error = new ValidationError('Test', [{ field: 'message', message: 'Required' }]);
      const response = error.toResponse('corr_123');

      expect(response).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Test',
          details: [{ field: 'message', message: 'Required' }],
          correlationId: 'corr_123',
          retryable: undefined,
        },
      });
    });

    it('should flag retryable errors in the response', () => {
      const response = new SessionBusyError('sess_1').toResponse('corr_1');
      expect(response.error.retryable).toBe(true);
      expect(response.error.message).toBe('Session is currently processing another message. Please retry.');
    });
  });

  describe('Status Code Mapping', () => {
    it('should have correct status codes', () => {
      expect(new ValidationError('test').statusCode).toBe(400);
      expect(new NotFoundError().statusCode).toBe(404);
      expect(new SessionBusyError('s').statusCode).toBe(409);
      expect(new DiscoveryError('test').statusCode).toBe(502);
      expect(new OracleError('test', 1).statusCode).toBe(502);
      expect(new CatalogNotInitializedError().statusCode).toBe(503);
      expect(new TimeoutError().statusCode).toBe(504);
      expect(new InternalError().statusCode).toBe(500);
    });
  });

  describe('Error Codes', () => {
    it('should have correct error codes', () => {
      expect(new NotFoundError().code).toBe('NOT_FOUND');
      expect(new SessionBusyError('s').code).toBe('SESSION_BUSY');
      expect(new DiscoveryError('test').code).toBe('DISCOVERY_ERROR');
      expect(new CatalogNotInitializedError().code).toBe('NOT_INITIALIZED');
      expect(new OracleError('test', 2).code).toBe('ORACLE_ERROR');
      expect(new TimeoutError().code).toBe('TIMEOUT_ERROR');
      expect(new InternalError().code).toBe('INTERNAL_ERROR');
    });
  });

  describe('Messages', () => {
    it('should build not-found messages from the resource name', () => {
      expect(new NotFoundError("Session 'abc'").message).toBe("Session 'abc' not found");
    });

    it('should keep the failing round on OracleError', () => {
      const cause = new Error('boom');
      const error = new OracleError('Decision oracle call failed: boom', 3, cause);
      expect(error.round).toBe(3);
      expect(error.originalError).toBe(cause);
      expect(error.retryable).toBe(true);
    });

    it('should name the tool in UnknownToolError', () => {
      const error = new UnknownToolError('drop_keyspace');
      expect(error.message).toBe("Tool 'drop_keyspace' is not in the current catalog");
      expect(error.toolName).toBe('drop_keyspace');
    });
  });

  describe('isAppError', () => {
    it('should return true for AppError instances', () => {
      expect(isAppError(new ValidationError('test'))).toBe(true);
      expect(isAppError(new OracleError('test', 1))).toBe(true);
    });

    it('should return false for tool errors and plain values', () => {
      expect(isAppError(new ToolInvocationError('failed', 'node_health'))).toBe(false);
      expect(isAppError(new Error('test'))).toBe(false);
      expect(isAppError('string')).toBe(false);
      expect(isAppError(null)).toBe(false);
    });

    it('should recognise subclasses as AppError', () => {
      expect(new DiscoveryError('x')).toBeInstanceOf(AppError);
    });
  });

  describe('errorMessage', () => {
    it('should read Error messages and stringify anything else', () => {
      expect(errorMessage(new Error('broken pipe'))).toBe('broken pipe');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
