import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { textResult } from '../../mcp-core/tool-results.js';
import type { SessionView } from '../../oauth/types.js';
import { formatTimestamp } from '../../utils/timestamp.js';

export function formatAuthStatus(session: SessionView): string {
  const { identity } = session;
  return `✅ Authenticated with GitHub

**User Information:**
- Username: @${identity.login}
- Name: ${identity.name ?? 'N/A'}
- Email: ${identity.email ?? 'N/A'}
- Bio: ${identity.bio ?? 'N/A'}
- Location: ${identity.location ?? 'N/A'}
- Company: ${identity.company ?? 'N/A'}
- Avatar: ${identity.avatarUrl ?? 'N/A'}
- Profile: https://github.com/${identity.login}
- Member since: ${identity.createdAt ?? 'N/A'}

**Session Information:**
- Token Type: ${session.tokenType}
- Scope: ${session.scope}
- Authenticated at: ${formatTimestamp(session.createdAt)}`;
}

export function registerGitHubAuthStatusTool(mcp: McpServer, { authFlow }: McpDeps): void {
  mcp.registerTool(
    'github_auth_status',
    {
      title: 'GitHub Auth Status',
      description: 'Show whether a GitHub user is logged in, with their profile and session details.',
    },
    async () => {
      const status = authFlow.status();
      if (!status.authenticated) {
        return textResult(`🔓 Not Authenticated

Use the 'github_login' tool to authenticate with GitHub.`);
      }
      return textResult(formatAuthStatus(status.session));
    },
  );
}
