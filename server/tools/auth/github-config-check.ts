import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { textResult } from '../../mcp-core/tool-results.js';
import { ConfigurationError } from '../../oauth/errors.js';

function setupInstructions(baseUrl: string): string {
  return `**Setup Instructions:**

1. Create a GitHub OAuth App:
   - Go to: https://github.com/settings/developers
   - Click "New OAuth App"
   - Homepage URL: ${baseUrl}
   - Authorization callback URL: ${baseUrl}/auth/callback

2. Set environment variables in your .env file:
   GITHUB_CLIENT_ID=your_client_id
   GITHUB_CLIENT_SECRET=your_client_secret
   GITHUB_REDIRECT_URI=${baseUrl}/auth/callback

3. Restart the MCP server`;
}

export function registerGitHubConfigCheckTool(mcp: McpServer, { authFlow, baseUrl }: McpDeps): void {
  mcp.registerTool(
    'github_config_check',
    {
      title: 'GitHub Config Check',
      description: 'Check that the GitHub OAuth app credentials are configured. Secrets are never shown.',
    },
    async () => {
      try {
        const config = authFlow.checkConfiguration();
        return textResult(`✅ GitHub OAuth Configuration

**Client ID:** ${config.clientId}
**Client Secret:** ******** (hidden)
**Redirect URI:** ${config.redirectUri}
**Scopes:** ${config.scopes.join(' ') || '(none)'}

Configuration is valid! You can use the 'github_login' tool to authenticate.`);
      } catch (error) {
        if (!(error instanceof ConfigurationError)) {
          throw error;
        }
        return textResult(`❌ Configuration Error

${error.message}

${setupInstructions(baseUrl)}`);
      }
    },
  );
}
