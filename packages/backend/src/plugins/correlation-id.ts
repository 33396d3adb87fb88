/**
 * Correlation ID plugin for request tracing
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { generateCorrelationId } from '../utils/crypto.js';
import { createRequestLogger } from '../utils/logger.js';

const correlationIdPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('correlationId', '');

  fastify.addHook('onRequest', async (request) => {
    // Use existing correlation ID from header or generate new one
    const header = request.headers['x-correlation-id'];
    request.correlationId = typeof header === 'string' && header ? header : generateCorrelationId();

    createRequestLogger({ correlationId: request.correlationId }).info(
      {
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  fastify.addHook('onResponse', async (request, reply) => {
    createRequestLogger({ correlationId: request.correlationId }).info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  fastify.addHook('onSend', async (request, reply) => {
    // Include correlation ID in response headers
    reply.header('x-correlation-id', request.correlationId);
  });
};

export default fp(correlationIdPlugin, {
  name: 'correlation-id',
});
