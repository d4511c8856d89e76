import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { textResult } from '../../mcp-core/tool-results.js';

export function registerGitHubLogoutTool(mcp: McpServer, { authFlow }: McpDeps): void {
  mcp.registerTool(
    'github_logout',
    {
      title: 'GitHub Logout',
      description: 'Log out of GitHub and delete the current session.',
    },
    async () => {
      const result = await authFlow.logout();
      if (!result.loggedOut) {
        return textResult('ℹ️ Not currently logged in.');
      }
      return textResult(`✅ Successfully logged out @${result.login}

You will need to login again to access protected tools.`);
    },
  );
}
