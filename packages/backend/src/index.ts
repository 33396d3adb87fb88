/**
 * Cassandra Doctor API - Main Entry Point
 */

// Load environment variables from .env file
import 'dotenv/config';

import { buildApp } from './app.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { createOracle } from './providers/index.js';
import { ChatService } from './services/chat.service.js';
import { Orchestrator } from './services/orchestration.service.js';
import { SessionStore } from './services/session.service.js';
import { ToolCatalog } from './tools/catalog.js';
import { ToolInvoker } from './tools/invoker.js';
import { McpToolProvider, createTransportFactory } from './tools/mcp-provider.js';

async function main(): Promise<void> {
  logger.info({ env: config.env, oracle: config.oracle.provider }, 'Starting Cassandra Doctor');

  const provider = new McpToolProvider(createTransportFactory(config.toolServer));
  const catalog = new ToolCatalog(provider);
  const invoker = new ToolInvoker(catalog, provider, { timeoutMs: config.toolServer.toolTimeoutMs });
  const orchestrator = new Orchestrator(createOracle(config.oracle), invoker, {
    maxRounds: config.orchestration.maxRounds,
    oracleTimeoutMs: config.oracle.timeoutMs,
  });
  const sessions = new SessionStore({ idleTtlMs: config.session.idleTtlMs });
  const chatService = new ChatService(sessions, catalog, orchestrator, {
    catalogRefresh: config.toolServer.catalogRefresh,
    sweepIntervalMs: config.session.sweepIntervalMs,
  });

  // Build and start the app
  const app = await buildApp({ chatService, sessions, catalog });

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(
      { port: config.server.port, host: config.server.host },
      'Server started'
    );

    chatService.startSweeper();

    // Handle shutdown gracefully
    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Received shutdown signal');

      // Stop accepting new requests
      await app.close();
      logger.info('Server closed');

      chatService.stopSweeper();

      await provider.close();
      logger.info('Tool server connection closed');

      process.exit(0);
    };

    const onShutdownError = (error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    };
    process.on('SIGTERM', () => shutdown('SIGTERM').catch(onShutdownError));
    process.on('SIGINT', () => shutdown('SIGINT').catch(onShutdownError));
  } catch (error) {
    logger.fatal({ error }, 'Failed to start server');
    await provider.close();
    process.exit(1);
  }
}

main().catch((error) => {
  logger.fatal({ error }, 'Unhandled error during startup');
  process.exit(1);
});
