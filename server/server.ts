#!/usr/bin/env node
// Environment first: instruments.ts reads SENTRY_DSN when it loads
import 'dotenv/config';
import './observability/instruments.js';

import * as Sentry from '@sentry/node';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createMcpServer } from './mcp-core/server-factory.js';
import { createMcpService } from './mcp-service.js';
import { createAuthFlow } from './oauth/index.js';
import { errorMessage } from './oauth/errors.js';
import { logger } from './observability/logger.js';
import { WeatherClient } from './travel/weather.js';

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', { error: errorMessage(reason) });
  Sentry.captureException(reason);
});

process.on('uncaughtException', (err: Error) => {
  logger.error('Uncaught exception', { error: err.message, stack: err.stack });
  Sentry.captureException(err);
});

async function main(): Promise<void> {
  const config = loadConfig();
  const authFlow = createAuthFlow(config);
  const weather = new WeatherClient({ timeoutMs: config.weatherTimeoutMs });
  const deps = { authFlow, weather, baseUrl: config.baseUrl };

  if (config.transport === 'stdio') {
    // No browser routes in stdio mode, so GitHub has nowhere to redirect to
    const mcp = createMcpServer(deps);
    await mcp.connect(new StdioServerTransport());
    logger.info("Cox's Bazar AI Itinerary MCP server running on stdio");
    return;
  }

  const mcpService = createMcpService(deps);
  mcpService.startReaper();

  const app = createApp({ authFlow, mcpService, baseUrl: config.baseUrl });
  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`, { baseUrl: config.baseUrl });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close();
    mcpService.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Server failed to start', { error: errorMessage(error) });
  Sentry.captureException(error);
  process.exit(1);
});
