/**
 * Health check routes
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ToolCatalog } from '../tools/catalog.js';
import { errorMessage } from '../utils/errors.js';

export interface HealthRoutesOptions {
  catalog: ToolCatalog;
}

const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { catalog }) => {
  /**
   * Basic health check
   */
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    };
  });

  /**
   * Readiness check (tool server discovery)
   */
  fastify.get('/ready', async (request, reply) => {
    try {
      const snapshot = await catalog.refresh();
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        checks: {
          toolServer: 'connected',
          tools: snapshot.tools.length,
        },
      };
    } catch (error) {
      return reply.status(503).send({
        status: 'error',
        timestamp: new Date().toISOString(),
        checks: {
          toolServer: 'unreachable',
          reason: errorMessage(error),
        },
      });
    }
  });
};

export default healthRoutes;
