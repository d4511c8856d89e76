/**
 * MCP Server Factory
 *
 * Creates a fresh MCP server instance per transport session. All instances
 * share the process-wide AuthFlow, so a login completed in the browser is
 * visible to every connected client.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SERVICE_VERSION } from '../config.js';
import { logger } from '../observability/logger.js';
import { registerAuthTools } from '../tools/auth/index.js';
import { registerTravelTools } from '../tools/travel/index.js';
import type { McpDeps } from './mcp-types.js';

export const SERVER_NAME = "Cox's Bazar AI Itinerary MCP";
export const SERVER_VERSION = SERVICE_VERSION;

/**
 * @example
 * const mcp = createMcpServer({ authFlow, weather, baseUrl: 'http://localhost:8000' });
 * await mcp.connect(new StdioServerTransport());
 */
export function createMcpServer(deps: McpDeps): McpServer {
  const mcp = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
        logging: {},
      },
    },
  );

  registerTravelTools(mcp, deps);
  registerAuthTools(mcp, deps);

  logger.info('MCP server instance created');
  return mcp;
}
