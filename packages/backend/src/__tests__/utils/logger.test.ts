/**
 * Logger tests
 */

import { describe, it, expect } from 'vitest';
import { createRequestLogger, logger, serializers } from '../../utils/logger.js';

describe('logger', () => {
  it('should stay silent under test', () => {
    expect(logger.level).toBe('silent');
  });

  it('should bind turn context to request loggers', () => {
    expect(createRequestLogger({ correlationId: 'corr_1', sessionId: 'sess_1' }).bindings()).toMatchObject({
      service: 'cassandra-doctor-api',
      correlationId: 'corr_1',
      sessionId: 'sess_1',
    });
  });

  it('should serialize errors logged under the error key', () => {
    const serialized = serializers.error(new Error('connect ECONNREFUSED'));

    expect(serialized).toMatchObject({ type: 'Error', message: 'connect ECONNREFUSED' });
    expect(serialized.stack).toContain('connect ECONNREFUSED');
  });
});
