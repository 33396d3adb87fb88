/**
 * Fastify application setup
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import correlationIdPlugin from './plugins/correlation-id.js';
import errorHandlerPlugin from './plugins/error-handler.js';
import type { ChatService } from './services/chat.service.js';
import type { SessionStore } from './services/session.service.js';
import type { ToolCatalog } from './tools/catalog.js';

// Routes
import healthRoutes from './routes/health.js';
import chatRoutes from './routes/chat.js';
import sessionRoutes from './routes/sessions.js';
import toolRoutes from './routes/tools.js';

export interface AppDependencies {
  chatService: ChatService;
  sessions: SessionStore;
  catalog: ToolCatalog;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
    requestIdHeader: 'x-correlation-id',
    requestIdLogLabel: 'correlationId',
  });

  // Register plugins in order
  await app.register(cors, {
    origin: config.isDev ? true : [`http://localhost:${config.server.port}`],
    credentials: true,
  });

  // Swagger documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Cassandra Doctor API',
        description: 'Chat gateway with MCP tool calling',
        version: '1.0.0',
      },
      servers: [
        {
          url: `http://localhost:${config.server.port}`,
          description: 'Development server',
        },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // Core plugins
  await app.register(correlationIdPlugin);
  await app.register(errorHandlerPlugin);

  // API routes
  await app.register(healthRoutes, { catalog: deps.catalog });
  await app.register(chatRoutes, { chatService: deps.chatService });
  await app.register(sessionRoutes, { sessions: deps.sessions });
  await app.register(toolRoutes, { catalog: deps.catalog });

  // Log registered routes in development
  if (config.isDev) {
    app.ready(() => {
      logger.debug({ routes: app.printRoutes() }, 'Registered routes');
    });
  }

  return app;
}
