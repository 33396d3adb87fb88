/**
 * Application error classes
 * Structured errors that don't leak internal details
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'SESSION_BUSY'
  | 'DISCOVERY_ERROR'
  | 'NOT_INITIALIZED'
  | 'ORACLE_ERROR'
  | 'TIMEOUT_ERROR'
  | 'INTERNAL_ERROR';

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface ErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: ErrorDetail[];
    correlationId?: string;
    retryable?: boolean;
  };
}

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number,
    public readonly details?: ErrorDetail[],
    public readonly retryable = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toResponse(correlationId?: string): ErrorResponse {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        correlationId,
        retryable: this.retryable || undefined,
      },
    };
  }
}

/**
 * 400 Bad Request - Validation errors
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super('VALIDATION_ERROR', message, 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(resource = 'Resource') {
    super('NOT_FOUND', `${resource} not found`, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * 409 Conflict - Another turn is in flight for the session
 */
export class SessionBusyError extends AppError {
  constructor(public readonly sessionId: string) {
    super(
      'SESSION_BUSY',
      'Session is currently processing another message. Please retry.',
      409,
      undefined,
      true
    );
    this.name = 'SessionBusyError';
  }
}

/**
 * 502 Bad Gateway - Tool catalog could not be fetched
 */
export class DiscoveryError extends AppError {
  constructor(message: string, public readonly originalError?: unknown) {
    super('DISCOVERY_ERROR', message, 502, undefined, true);
    this.name = 'DiscoveryError';
  }
}

/**
 * 503 Service Unavailable - No catalog fetch has succeeded yet
 */
export class CatalogNotInitializedError extends AppError {
  constructor(message = 'Tool catalog has not been discovered yet') {
    super('NOT_INITIALIZED', message, 503);
    this.name = 'CatalogNotInitializedError';
  }
}

/**
 * 502 Bad Gateway - Decision oracle call failed
 */
export class OracleError extends AppError {
  constructor(
    message: string,
    public readonly round: number,
    public readonly originalError?: unknown
  ) {
    super('ORACLE_ERROR', message, 502, undefined, true);
    this.name = 'OracleError';
  }
}

/**
 * Operation exceeded its time budget
 */
export class TimeoutError extends AppError {
  constructor(message = 'Request timed out') {
    super('TIMEOUT_ERROR', message, 504);
    this.name = 'TimeoutError';
  }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal server error') {
    super('INTERNAL_ERROR', message, 500);
    this.name = 'InternalError';
  }
}

/**
 * The oracle asked for a tool that is not in the catalog.
 * Never reaches the caller; the invoker records it as a tool outcome.
 */
export class UnknownToolError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' is not in the current catalog`);
    this.name = 'UnknownToolError';
  }
}

/**
 * A remote tool call failed (transport fault, malformed response or
 * a tool-reported error). Recorded as a tool outcome.
 */
export class ToolInvocationError extends Error {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'ToolInvocationError';
  }
}

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
