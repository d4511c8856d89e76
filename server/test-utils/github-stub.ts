/**
 * In-process stand-in for GitHub's OAuth endpoints, for Jest tests
 */

import type { GitHubOAuthSettings } from '../config.js';
import { AuthFlow } from '../oauth/auth-flow.js';
import { GITHUB_TOKEN_URL, GITHUB_USER_URL, GitHubClient } from '../oauth/github-client.js';
import { SessionStore } from '../oauth/session-store.js';
import { StateStore } from '../oauth/state-store.js';
import { jsonResponse, requestUrl } from './http.js';

export const TEST_SETTINGS: GitHubOAuthSettings = {
  clientId: 'test-client-id-0001',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:8000/auth/callback',
  scopes: ['read:user', 'user:email'],
};

export interface GitHubStubOptions {
  tokenStatus?: number;
  tokenBody?: unknown;
  userStatus?: number;
  userBody?: unknown;
}

/**
 * A fetch mock that answers GitHub's token and user endpoints
 */
export function createGitHubFetchStub(options: GitHubStubOptions = {}) {
  return jest.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const url = requestUrl(input);
    if (url === GITHUB_TOKEN_URL) {
      return jsonResponse(
        options.tokenBody ?? { access_token: 'tok1', token_type: 'bearer', scope: 'read:user,user:email' },
        options.tokenStatus ?? 200,
      );
    }
    if (url === GITHUB_USER_URL) {
      return jsonResponse(options.userBody ?? { id: 42, login: 'alice', name: 'Alice' }, options.userStatus ?? 200);
    }
    throw new Error(`Unexpected request to ${url}`);
  });
}

export interface TestAuthFlow {
  authFlow: AuthFlow;
  states: StateStore;
  sessions: SessionStore;
  fetchStub: ReturnType<typeof createGitHubFetchStub>;
}

export function createTestAuthFlow(
  stubOptions: GitHubStubOptions = {},
  settings: GitHubOAuthSettings = TEST_SETTINGS,
): TestAuthFlow {
  const fetchStub = createGitHubFetchStub(stubOptions);
  const states = new StateStore();
  const sessions = new SessionStore();
  const authFlow = new AuthFlow({
    settings,
    states,
    sessions,
    github: new GitHubClient({ fetch: fetchStub, timeoutMs: 1000 }),
  });
  return { authFlow, states, sessions, fetchStub };
}

/**
 * Run a full login against the stub and return the new session view
 */
export async function loginAs(flow: TestAuthFlow) {
  const { state } = flow.authFlow.startLogin();
  return flow.authFlow.completeLogin({ code: 'abc', state });
}
