/**
 * Identifier generation for request tracing and sessions
 */

import { randomBytes } from 'crypto';

/**
 * Generate a correlation ID for request tracing
 */
export function generateCorrelationId(): string {
  return `corr_${randomBytes(12).toString('base64url')}`;
}

/**
 * Generate a unique ID with prefix
 */
export function generateId(prefix: string): string {
  return `${prefix}_${randomBytes(12).toString('base64url')}`;
}
