import { guardTool } from '../../mcp-core/guard-tool.js';
import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { textResult } from '../../mcp-core/tool-results.js';

/**
 * Register github_whoami, the protected tool: it only runs for a logged-in user
 */
export function registerGitHubWhoamiTool(mcp: McpServer, { authFlow }: McpDeps): void {
  mcp.registerTool(
    'github_whoami',
    {
      title: 'GitHub Who Am I',
      description: 'Show the profile of the logged-in GitHub user. Requires github_login first.',
    },
    guardTool(authFlow, async ({ identity }) => {
      const details = [
        identity.name ? `- Name: ${identity.name}` : undefined,
        identity.email ? `- Email: ${identity.email}` : undefined,
        identity.company ? `- Company: ${identity.company}` : undefined,
        identity.location ? `- Location: ${identity.location}` : undefined,
        `- Profile: https://github.com/${identity.login}`,
      ].filter((line): line is string => line !== undefined);

      return textResult(`👤 @${identity.login} (GitHub id ${identity.id})\n\n${details.join('\n')}`);
    }),
  );
}
