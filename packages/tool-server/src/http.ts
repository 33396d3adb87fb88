/**
 * Streamable HTTP transport: one stateless MCP server per request
 */

import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { buildToolServer, SERVER_NAME } from './server.js';
import { logger } from './utils/logger.js';
import type { Providers } from './providers/types.js';

export interface HttpAppOptions {
  createServer?: (providers: Providers) => McpServer;
}

const INTERNAL_ERROR_BODY = JSON.stringify({
  jsonrpc: '2.0',
  error: { code: -32603, message: 'Internal server error' },
  id: null,
});

export function buildHttpApp(providers: Providers, options: HttpAppOptions = {}): FastifyInstance {
  const createServer = options.createServer ?? buildToolServer;
  const app = Fastify({ logger: false });

  app.get('/health', async () => ({ status: 'ok', server: SERVER_NAME }));

  app.post('/mcp', async (request, reply) => {
    const server = createServer(providers);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    reply.raw.on('close', () => {
      server.close().catch((error: unknown) => {
        logger.warn({ error }, 'Failed to close MCP server');
      });
    });

    // The transport writes the response itself
    reply.hijack();
    try {
      await server.connect(transport);
      await transport.handleRequest(request.raw, reply.raw, request.body);
    } catch (error) {
      logger.error({ error }, 'Failed to handle MCP request');
      if (!reply.raw.headersSent) {
        reply.raw.writeHead(500, { 'content-type': 'application/json' });
      }
      if (!reply.raw.writableEnded) {
        reply.raw.end(INTERNAL_ERROR_BODY);
      }
    }
  });

  // Stateless: no SSE stream and no session to delete
  const methodNotAllowed = async (_request: unknown, reply: FastifyReply) =>
    reply.status(405).send({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);

  return app;
}
