import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { logger } from '../../observability/logger.js';
import { registerAuthResources } from './auth-resources.js';
import { registerGitHubAuthStatusTool } from './github-auth-status.js';
import { registerGitHubConfigCheckTool } from './github-config-check.js';
import { registerGitHubDebugSessionsTool } from './github-debug-sessions.js';
import { registerGitHubLoginTool } from './github-login.js';
import { registerGitHubLogoutTool } from './github-logout.js';
import { registerGitHubWhoamiTool } from './github-whoami.js';

/**
 * Register the GitHub login tools and the auth resources
 */
export function registerAuthTools(mcp: McpServer, deps: McpDeps): void {
  registerGitHubLoginTool(mcp, deps);
  registerGitHubLogoutTool(mcp, deps);
  registerGitHubAuthStatusTool(mcp, deps);
  registerGitHubConfigCheckTool(mcp, deps);
  registerGitHubDebugSessionsTool(mcp, deps);
  registerGitHubWhoamiTool(mcp, deps);
  registerAuthResources(mcp, deps);

  logger.debug('Auth tools registered');
}
