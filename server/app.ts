/**
 * Express application
 *
 * Routes:
 * - GET  /health          liveness probe
 * - GET  /                HTML page listing the endpoints
 * - GET  /auth/*          browser side of the GitHub login
 * - POST|GET|DELETE /mcp  Streamable HTTP MCP transport
 */

import * as Sentry from '@sentry/node';
import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import morgan from 'morgan';
import type { McpService } from './mcp-service.js';
import type { AuthFlow } from './oauth/auth-flow.js';
import { errorMessage } from './oauth/errors.js';
import { logger } from './observability/logger.js';
import { escapeHtml } from './utils/html.js';
import { registerAuthRoutes } from './web-auth/index.js';

export interface AppDeps {
  authFlow: AuthFlow;
  mcpService: McpService;
  baseUrl: string;
  /** Disable access logs (tests) */
  quiet?: boolean;
}

function renderHomePage(baseUrl: string): string {
  const base = escapeHtml(baseUrl);
  return `<!DOCTYPE html>
<html>
  <head><title>Cox's Bazar AI Itinerary MCP</title></head>
  <body style="font-family: system-ui, sans-serif; max-width: 700px; margin: 50px auto;">
    <h1>🌴 Cox's Bazar AI Itinerary MCP</h1>
    <p>MCP server with weather-aware itinerary tools for Cox's Bazar, Bangladesh, and an optional GitHub login.</p>
    <h2>Available Endpoints</h2>
    <ul>
      <li><strong>MCP Endpoint</strong> - <code>${base}/mcp</code></li>
      <li><a href="/auth/login">Login with GitHub</a></li>
      <li><a href="/auth/status">Authentication Status</a></li>
      <li><a href="/auth/logout">Logout</a></li>
      <li><a href="/health">Health Check</a></li>
    </ul>
  </body>
</html>`;
}

function forwardErrors(handler: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createApp({ authFlow, mcpService, baseUrl, quiet }: AppDeps): Express {
  const app = express();

  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS', 'DELETE'],
      allowedHeaders: ['Content-Type', 'mcp-session-id', 'Authorization', 'mcp-protocol-version'],
      exposedHeaders: ['mcp-session-id'],
      maxAge: 86400,
    }),
  );

  if (!quiet) {
    app.use(
      morgan('common', {
        stream: {
          write: (message: string) => logger.info(message.trim()),
        },
      }),
    );
  }

  app.use(express.json());

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/', (req, res) => {
    res.type('html').send(renderHomePage(baseUrl));
  });

  registerAuthRoutes(app, authFlow);

  app.post('/mcp', forwardErrors((req, res) => mcpService.handlePost(req, res)));
  app.get('/mcp', forwardErrors((req, res) => mcpService.handleSessionRequest(req, res)));
  app.delete('/mcp', forwardErrors((req, res) => mcpService.handleSessionRequest(req, res)));

  // Sentry's handler must come after every route
  Sentry.setupExpressErrorHandler(app);

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    logger.error('Unhandled request error', { path: req.path, error: errorMessage(err) });
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
