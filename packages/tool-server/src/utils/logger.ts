/**
 * Logger for the tool server.
 * stdout carries the stdio transport, so everything goes to stderr.
 */

import pino from 'pino';
import { config } from '../config/index.js';

const serializers = { error: pino.stdSerializers.err };

export const logger = config.isDev
  ? pino({
      level: config.log.level,
      base: { service: 'cass-doctor-tools' },
      serializers,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(
      {
        level: config.log.level,
        base: { service: 'cass-doctor-tools', env: config.env },
        serializers,
      },
      pino.destination(2)
    );

export type Logger = pino.Logger;
