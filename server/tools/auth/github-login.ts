import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { textResult } from '../../mcp-core/tool-results.js';
import { ConfigurationError, errorMessage } from '../../oauth/errors.js';
import { logger } from '../../observability/logger.js';

/**
 * Register the github_login tool
 *
 * The tool cannot open a browser itself; it hands the user the login URL
 * served by this process. The state token is issued when that URL is
 * visited, not here.
 */
export function registerGitHubLoginTool(mcp: McpServer, { authFlow, baseUrl }: McpDeps): void {
  mcp.registerTool(
    'github_login',
    {
      title: 'GitHub Login',
      description: 'Start the GitHub OAuth login. Returns the URL to open in a browser, or the current user when already logged in.',
    },
    async () => {
      logger.info('github_login called');

      const status = authFlow.status();
      if (status.authenticated) {
        const { identity } = status.session;
        return textResult(`✅ Already logged in as @${identity.login}

User Details:
- Name: ${identity.name ?? 'N/A'}
- Email: ${identity.email ?? 'N/A'}
- GitHub: https://github.com/${identity.login}

To logout, use the 'github_logout' tool.`);
      }

      try {
        authFlow.checkConfiguration();
      } catch (error) {
        if (error instanceof ConfigurationError) {
          return textResult(`❌ Configuration Error

${error.message}

Please set the required environment variables in your .env file or environment.`);
        }
        logger.error('github_login failed', { error: errorMessage(error) });
        return textResult(`❌ Error initiating login: ${errorMessage(error)}`);
      }

      return textResult(`🔐 GitHub Authentication Required

To use protected tools, please authenticate with GitHub:

${baseUrl}/auth/login

**Steps:**
1. Click the URL above or copy it to your browser
2. Authorize the application on GitHub
3. You'll be redirected back automatically
4. Return here and run your tool again`);
    },
  );
}
