/**
 * MCP Service Tests
 *
 * Requests that cannot be matched to a session are answered before any
 * transport is involved.
 */

import type { Request, Response } from 'express';
import { createMcpService } from './mcp-service.js';
import { createTestAuthFlow } from './test-utils/github-stub.js';
import { WeatherClient } from './travel/weather.js';

function mockRequest(body: unknown, sessionId?: string): Request {
  const headers: Record<string, string> = sessionId ? { 'mcp-session-id': sessionId } : {};
  return { body, headers } as Partial<Request> as Request;
}

function mockResponse() {
  const res = {
    status: jest.fn().mockReturnThis(),
    json: jest.fn().mockReturnThis(),
    send: jest.fn().mockReturnThis(),
  };
  return { res, response: res as unknown as Response };
}

describe('createMcpService', () => {
  function createService() {
    return createMcpService({
      authFlow: createTestAuthFlow().authFlow,
      weather: new WeatherClient({ fetch: jest.fn().mockRejectedValue(new TypeError('fetch failed')) }),
      baseUrl: 'http://localhost:8000',
    });
  }

  const badRequest = {
    jsonrpc: '2.0',
    error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
    id: null,
  };

  it('should reject a non-initialize request without a session id', async () => {
    const service = createService();
    const { res, response } = mockResponse();

    await service.handlePost(mockRequest({ jsonrpc: '2.0', id: 1, method: 'tools/list' }), response);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith(badRequest);
    expect(service.sessionCount()).toBe(0);
  });

  it('should reject an unknown session id', async () => {
    const service = createService();
    const { res, response } = mockResponse();

    await service.handlePost(mockRequest({ jsonrpc: '2.0', id: 1, method: 'tools/list' }, 'no-such-session'), response);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith(badRequest);
  });

  it('should reject an initialize request that carries an unknown session id', async () => {
    const service = createService();
    const { res, response } = mockResponse();

    await service.handlePost(mockRequest({ jsonrpc: '2.0', id: 1, method: 'initialize' }, 'stale-session'), response);

    expect(res.json).toHaveBeenCalledWith(badRequest);
    expect(service.sessionCount()).toBe(0);
  });

  it('should answer GET and DELETE for unknown sessions with 400', async () => {
    const service = createService();
    const { res, response } = mockResponse();

    await service.handleSessionRequest(mockRequest(undefined), response);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.send).toHaveBeenCalledWith('Invalid or missing session ID');
  });

  it('should have nothing to reap or close without sessions', async () => {
    const service = createService();

    await expect(service.reapIdleSessions()).resolves.toBe(0);
    await expect(service.close()).resolves.toBeUndefined();
  });
});
