/**
 * OAuth Module
 *
 * GitHub login for the MCP server: state tokens, code exchange, sessions
 * and the auth guard, wired together by AuthFlow.
 *
 * Usage:
 *   import { createAuthFlow } from './oauth/index.js';
 *   const authFlow = createAuthFlow(loadConfig());
 */

import type { ServerConfig } from '../config.js';
import { AuthFlow } from './auth-flow.js';
import { GitHubClient, type GitHubClientOptions } from './github-client.js';
import { SessionStore } from './session-store.js';
import { StateStore } from './state-store.js';

export function createAuthFlow(
  config: Pick<ServerConfig, 'github' | 'stateTtlMs' | 'oauthTimeoutMs'>,
  clientOptions: GitHubClientOptions = {},
): AuthFlow {
  return new AuthFlow({
    settings: config.github,
    states: new StateStore({ ttlMs: config.stateTtlMs }),
    sessions: new SessionStore(),
    github: new GitHubClient({ timeoutMs: config.oauthTimeoutMs, ...clientOptions }),
  });
}

export { AuthFlow, maskClientId } from './auth-flow.js';
export { guarded } from './auth-guard.js';
export { GitHubClient } from './github-client.js';
export { SessionStore } from './session-store.js';
export { StateStore } from './state-store.js';
export * from './errors.js';

export type { AuthenticatedContext, GuardedOperation } from './auth-guard.js';
export type { CallbackParams, LoginStart, MaskedConfig, SessionDebugInfo } from './auth-flow.js';
export type * from './types.js';
