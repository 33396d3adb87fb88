/**
 * Cassandra Doctor tool server - entry point
 */

import 'dotenv/config';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { config } from './config/index.js';
import { buildHttpApp } from './http.js';
import { createMockProviders } from './providers/mock.js';
import { buildToolServer } from './server.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const providers = createMockProviders();

  if (config.transport === 'http') {
    const app = buildHttpApp(providers);
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info({ port: config.server.port, host: config.server.host }, 'Tool server listening on /mcp');

    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Received shutdown signal');
      await app.close();
      process.exit(0);
    };
    const onShutdownError = (error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    };
    process.on('SIGTERM', () => shutdown('SIGTERM').catch(onShutdownError));
    process.on('SIGINT', () => shutdown('SIGINT').catch(onShutdownError));
    return;
  }

  const server = buildToolServer(providers);
  await server.connect(new StdioServerTransport());
  logger.info('Tool server ready on stdio');
}

main().catch((error) => {
  logger.fatal({ error }, 'Tool server failed to start');
  process.exit(1);
});
