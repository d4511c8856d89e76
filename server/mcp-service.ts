/**
 * MCP Service Module
 *
 * Streamable HTTP transport for the MCP server. Each MCP session gets its
 * own transport and its own McpServer instance, created on `initialize`
 * and dropped when the transport closes or after 10 minutes without
 * activity.
 *
 * This module contains:
 * - createMcpService(): per-process session map plus the Express handlers
 * - handlePost(): initialization and ongoing client-to-server requests
 * - handleSessionRequest(): GET (SSE stream) and DELETE for known sessions
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response } from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createMcpServer } from './mcp-core/server-factory.js';
import type { McpDeps, McpServer } from './mcp-core/mcp-types.js';
import { errorMessage } from './oauth/errors.js';
import { logger } from './observability/logger.js';

interface SessionData {
  transport: StreamableHTTPServerTransport;
  mcpServer: McpServer;
  lastActivityAt: number;
}

export const SESSION_IDLE_THRESHOLD_MS = 10 * 60 * 1000;
const SESSION_REAPER_INTERVAL_MS = 60 * 1000;

export interface McpServiceOptions {
  idleThresholdMs?: number;
  now?: () => number;
}

export interface McpService {
  handlePost(req: Request, res: Response): Promise<void>;
  handleSessionRequest(req: Request, res: Response): Promise<void>;
  /** Close sessions idle for longer than the threshold; returns how many */
  reapIdleSessions(): Promise<number>;
  startReaper(): void;
  sessionCount(): number;
  close(): Promise<void>;
}

function headerSessionId(req: Request): string | undefined {
  const value = req.headers['mcp-session-id'];
  return typeof value === 'string' ? value : undefined;
}

function isInitializeBody(body: unknown): boolean {
  // Malformed initialize bodies go to the transport, which answers them
  // with a JSON-RPC error
  return typeof body === 'object' && body !== null && 'method' in body && body.method === 'initialize';
}

function sendBadRequest(res: Response, message: string): void {
  res.status(400).json({
    jsonrpc: '2.0',
    error: { code: -32000, message },
    id: null,
  });
}

export function createMcpService(deps: McpDeps, options: McpServiceOptions = {}): McpService {
  const sessions = new Map<string, SessionData>();
  const idleThresholdMs = options.idleThresholdMs ?? SESSION_IDLE_THRESHOLD_MS;
  const now = options.now ?? (() => Date.now());
  let reaper: NodeJS.Timeout | undefined;

  async function closeSession(sessionId: string, session: SessionData): Promise<void> {
    sessions.delete(sessionId);
    try {
      await session.mcpServer.close();
    } catch (error) {
      logger.warn('Error closing MCP session', { sessionId, error: errorMessage(error) });
    }
  }

  async function reapIdleSessions(): Promise<number> {
    const cutoff = now() - idleThresholdMs;
    const idle = Array.from(sessions.entries()).filter(([, session]) => session.lastActivityAt < cutoff);
    for (const [sessionId, session] of idle) {
      logger.info('Reaping idle MCP session', { sessionId });
      await closeSession(sessionId, session);
    }
    return idle.length;
  }

  async function startSession(req: Request, res: Response): Promise<void> {
    const mcpServer = createMcpServer(deps);
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId: string) => {
        sessions.set(sessionId, { transport, mcpServer, lastActivityAt: now() });
        logger.info('MCP session initialized', { sessionId, activeSessions: sessions.size });
      },
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (sessionId && sessions.delete(sessionId)) {
        logger.info('MCP session closed', { sessionId, activeSessions: sessions.size });
      }
    };

    await mcpServer.connect(transport);
    await transport.handleRequest(req, res, req.body);
  }

  return {
    async handlePost(req, res) {
      const sessionId = headerSessionId(req);
      const existing = sessionId ? sessions.get(sessionId) : undefined;

      if (existing) {
        existing.lastActivityAt = now();
        await existing.transport.handleRequest(req, res, req.body);
        return;
      }

      if (!sessionId && isInitializeBody(req.body)) {
        await startSession(req, res);
        return;
      }

      logger.warn('MCP request rejected', { hasSessionId: !!sessionId });
      sendBadRequest(res, 'Bad Request: No valid session ID provided');
    },

    async handleSessionRequest(req, res) {
      const sessionId = headerSessionId(req);
      const session = sessionId ? sessions.get(sessionId) : undefined;
      if (!session) {
        res.status(400).send('Invalid or missing session ID');
        return;
      }

      session.lastActivityAt = now();
      await session.transport.handleRequest(req, res);
    },

    reapIdleSessions,

    startReaper() {
      if (reaper) {
        return;
      }
      reaper = setInterval(() => {
        reapIdleSessions().catch((error: unknown) => {
          logger.error('MCP session reaper failed', { error: errorMessage(error) });
        });
      }, SESSION_REAPER_INTERVAL_MS);
      reaper.unref();
    },

    sessionCount() {
      return sessions.size;
    },

    async close() {
      if (reaper) {
        clearInterval(reaper);
        reaper = undefined;
      }
      for (const [sessionId, session] of Array.from(sessions.entries())) {
        await closeSession(sessionId, session);
      }
    },
  };
}
