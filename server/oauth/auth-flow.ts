/**
 * GitHub Login Flow
 *
 * Sequences the state store, the GitHub client and the session store:
 *
 *   Anonymous --startLogin--> PendingState --completeLogin--> Authenticated
 *   Authenticated --logout--> Anonymous
 *
 * Web routes and MCP tools call this class; none of them touch the stores
 * directly. The state check runs before any network call, and no store
 * lock is held while GitHub is being contacted. A failed callback leaves
 * no session behind (the state token stays consumed).
 */

import { requireGitHubConfig, type GitHubOAuthSettings } from '../config.js';
import { logger } from '../observability/logger.js';
import { guarded, type GuardedOperation } from './auth-guard.js';
import { ExchangeError, InvalidStateError } from './errors.js';
import type { GitHubClient } from './github-client.js';
import type { SessionStore } from './session-store.js';
import type { StateStore } from './state-store.js';
import { toSessionView, type AuthStatus, type LogoutResult, type SessionView } from './types.js';

export interface AuthFlowDeps {
  settings: GitHubOAuthSettings;
  states: StateStore;
  sessions: SessionStore;
  github: GitHubClient;
}

export interface LoginStart {
  url: string;
  state: string;
}

export interface CallbackParams {
  code: string;
  state: string;
}

export interface MaskedConfig {
  clientId: string;
  redirectUri: string;
  scopes: string[];
}

export interface SessionDebugInfo {
  total: number;
  currentId?: string;
  sessions: SessionView[];
}

export class AuthFlow {
  constructor(private readonly deps: AuthFlowDeps) {}

  /**
   * Begin a login: issue a state token and build the GitHub authorization URL
   * @throws ConfigurationError when OAuth credentials are not set
   */
  startLogin(): LoginStart {
    const config = requireGitHubConfig(this.deps.settings);
    const state = this.deps.states.issue();
    const url = this.deps.github.buildAuthorizationUrl({
      clientId: config.clientId,
      redirectUri: config.redirectUri,
      scopes: config.scopes,
      state: state.value,
    });

    logger.info('Login started', { scopes: config.scopes });
    return { url, state: state.value };
  }

  /**
   * Handle the OAuth callback and make the new session current
   * @throws InvalidStateError when the state token fails validation
   * @throws ExchangeError | FetchError when GitHub cannot be used
   */
  async completeLogin(params: CallbackParams, options: { signal?: AbortSignal } = {}): Promise<SessionView> {
    const config = requireGitHubConfig(this.deps.settings);

    if (!this.deps.states.validate(params.state)) {
      throw new InvalidStateError();
    }

    const requestedScope = config.scopes.join(' ');
    const token = await this.deps.github.exchangeCodeForToken(
      {
        code: params.code,
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        redirectUri: config.redirectUri,
        requestedScope,
      },
      options,
    );
    const identity = await this.deps.github.fetchIdentity(token.accessToken, options);

    const session = await this.deps.sessions.createCurrent(
      {
        identity,
        accessToken: token.accessToken,
        tokenType: token.tokenType,
        scope: token.scope,
      },
      options.signal,
    );
    if (!session) {
      logger.warn('Login cancelled before the session was created', { login: identity.login });
      throw new ExchangeError('Login was cancelled');
    }

    logger.info('Login completed', { login: identity.login });
    return toSessionView(session);
  }

  status(): AuthStatus {
    const session = this.deps.sessions.getCurrent();
    if (!session) {
      return { authenticated: false };
    }
    return { authenticated: true, session: toSessionView(session) };
  }

  /**
   * Delete the current session. Safe to call when nobody is logged in.
   */
  async logout(): Promise<LogoutResult> {
    const session = await this.deps.sessions.deleteCurrent();
    if (!session) {
      return { loggedOut: false };
    }

    logger.info('Logged out', { login: session.identity.login });
    return { loggedOut: true, login: session.identity.login };
  }

  /**
   * Validate OAuth configuration and return it with the client id masked
   * @throws ConfigurationError
   */
  checkConfiguration(): MaskedConfig {
    const config = requireGitHubConfig(this.deps.settings);
    return {
      clientId: maskClientId(config.clientId),
      redirectUri: config.redirectUri,
      scopes: config.scopes,
    };
  }

  debugSessions(): SessionDebugInfo {
    const sessions = this.deps.sessions.list().map(toSessionView);
    return {
      total: sessions.length,
      currentId: this.deps.sessions.getCurrent()?.id,
      sessions,
    };
  }

  /**
   * Wrap an operation with the auth guard over this flow's session store
   */
  guard<TArgs extends unknown[], TResult>(
    operation: GuardedOperation<TArgs, TResult>,
  ): (...args: TArgs) => Promise<TResult> {
    return guarded(this.deps.sessions, operation);
  }
}

export function maskClientId(clientId: string): string {
  if (clientId.length <= 12) {
    return `${clientId.slice(0, 4)}...`;
  }
  return `${clientId.slice(0, 8)}...${clientId.slice(-4)}`;
}
