import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { jsonResource } from '../../mcp-core/tool-results.js';
import { AuthenticationRequiredError } from '../../oauth/errors.js';
import type { Identity } from '../../oauth/types.js';

export function identityToJson(identity: Identity): Record<string, string | null> {
  return {
    id: identity.id,
    login: identity.login,
    name: identity.name ?? null,
    email: identity.email ?? null,
    avatar_url: identity.avatarUrl ?? null,
    bio: identity.bio ?? null,
    company: identity.company ?? null,
    location: identity.location ?? null,
    created_at: identity.createdAt ?? null,
    profile_url: `https://github.com/${identity.login}`,
  };
}

export function registerAuthResources(mcp: McpServer, { authFlow }: McpDeps): void {
  const readProfile = authFlow.guard(async ({ identity }) => identityToJson(identity));

  mcp.registerResource(
    'github-user-profile',
    'auth://user/profile',
    {
      title: 'GitHub User Profile',
      description: 'Profile of the logged-in GitHub user',
      mimeType: 'application/json',
    },
    async (uri) => {
      try {
        return jsonResource(uri, await readProfile());
      } catch (error) {
        if (!(error instanceof AuthenticationRequiredError)) {
          throw error;
        }
        return jsonResource(uri, {
          error: 'Not authenticated',
          message: "Please login with GitHub using the 'github_login' tool",
        });
      }
    },
  );

  mcp.registerResource(
    'github-session-info',
    'auth://session/info',
    {
      title: 'GitHub Session Info',
      description: 'Current session details without any token',
      mimeType: 'application/json',
    },
    async (uri) => {
      const status = authFlow.status();
      if (!status.authenticated) {
        return jsonResource(uri, { authenticated: false, message: 'No active session' });
      }
      const { session } = status;
      return jsonResource(uri, {
        authenticated: true,
        token_type: session.tokenType,
        scope: session.scope,
        user: {
          username: session.identity.login,
          name: session.identity.name ?? null,
          avatar_url: session.identity.avatarUrl ?? null,
        },
        created_at: session.createdAt.toISOString(),
      });
    },
  );
}
