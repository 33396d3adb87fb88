/**
 * Structured logging
 */

import pino from 'pino';
import { config } from '../config/index.js';

/** Errors are logged under `error`, which pino only serializes as `err` by default */
export const serializers = {
  error: pino.stdSerializers.err,
};

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    service: 'cassandra-doctor-api',
    env: config.env,
  },
  serializers,
});

/**
 * Create a child logger bound to one chat turn
 */
export function createRequestLogger(context: { correlationId: string; sessionId?: string }): pino.Logger {
  return logger.child(context);
}

export type Logger = pino.Logger;
