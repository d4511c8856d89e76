/**
 * Shared TypeScript types for MCP tools, resources and prompts
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult, GetPromptResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import type { AuthFlow } from '../oauth/auth-flow.js';
import type { WeatherClient } from '../travel/weather.js';

export type { CallToolResult, GetPromptResult, McpServer, ReadResourceResult };

/**
 * Collaborators every per-session MCP server is built from. The AuthFlow is
 * shared by all sessions of the process.
 */
export interface McpDeps {
  authFlow: AuthFlow;
  weather: WeatherClient;
  /** Public URL of this server, used in login instructions */
  baseUrl: string;
  /** Clock for "today"; tests pin it */
  now?: () => Date;
}
