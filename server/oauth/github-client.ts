/**
 * GitHub OAuth Client
 *
 * The only part of the login flow that talks to the network:
 * - builds the browser authorization URL
 * - exchanges an authorization code for an access token
 * - fetches the authenticated user's identity
 *
 * Each outbound call is made exactly once (authorization codes are
 * single-use), carries the headers GitHub requires, and is bounded by a
 * timeout and by the caller's AbortSignal.
 */

import { SERVICE_NAME } from '../config.js';
import { logger, describeToken } from '../observability/logger.js';
import { createTimedSignal, describeFetchFailure } from '../utils/abort.js';
import { ConfigurationError, ExchangeError, FetchError } from './errors.js';
import {
  gitHubTokenResponseSchema,
  gitHubUserSchema,
  identityFromGitHubUser,
  type AccessToken,
  type Identity,
} from './types.js';

export const GITHUB_AUTHORIZE_URL = 'https://github.com/login/oauth/authorize';
export const GITHUB_TOKEN_URL = 'https://github.com/login/oauth/access_token';
export const GITHUB_USER_URL = 'https://api.github.com/user';
export const DEFAULT_USER_AGENT = SERVICE_NAME;
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

export interface GitHubClientOptions {
  authorizeUrl?: string;
  tokenUrl?: string;
  userUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export interface AuthorizationUrlParams {
  clientId: string;
  redirectUri: string;
  scopes: string[];
  state: string;
}

export interface CodeExchangeParams {
  code: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  /** Scope string to record when the provider omits one */
  requestedScope?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export class GitHubClient {
  private readonly authorizeUrl: string;
  private readonly tokenUrl: string;
  private readonly userUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GitHubClientOptions = {}) {
    this.authorizeUrl = options.authorizeUrl ?? GITHUB_AUTHORIZE_URL;
    this.tokenUrl = options.tokenUrl ?? GITHUB_TOKEN_URL;
    this.userUrl = options.userUrl ?? GITHUB_USER_URL;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Build the URL the browser is redirected to
   * @throws ConfigurationError if client id or redirect URI is empty
   */
  buildAuthorizationUrl(params: AuthorizationUrlParams): string {
    const missing: string[] = [];
    if (!params.clientId) missing.push('GITHUB_CLIENT_ID');
    if (!params.redirectUri) missing.push('GITHUB_REDIRECT_URI');
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing GitHub OAuth configuration: ${missing.join(', ')}`, missing);
    }

    const urlParams = new URLSearchParams({
      client_id: params.clientId,
      redirect_uri: params.redirectUri,
      scope: params.scopes.join(' '),
      state: params.state,
    });

    return `${this.authorizeUrl}?${urlParams.toString()}`;
  }

  /**
   * Exchange an authorization code for an access token
   * @throws ExchangeError on network failure, timeout, HTTP error or bad body
   */
  async exchangeCodeForToken(params: CodeExchangeParams, options: RequestOptions = {}): Promise<AccessToken> {
    logger.info('[GITHUB] Token exchange started', { endpoint: this.tokenUrl });

    const timed = createTimedSignal(this.timeoutMs, options.signal);
    let body: unknown;
    try {
      let response: Response;
      try {
        response = await this.fetchImpl(this.tokenUrl, {
          method: 'POST',
          headers: {
            'Accept': 'application/json',
            'Content-Type': 'application/x-www-form-urlencoded',
            'User-Agent': this.userAgent,
          },
          body: new URLSearchParams({
            client_id: params.clientId,
            client_secret: params.clientSecret,
            code: params.code,
            redirect_uri: params.redirectUri,
          }).toString(),
          signal: timed.signal,
        });
      } catch (err) {
        const reason = describeFetchFailure(err, timed.signal);
        logger.error('[GITHUB] Token exchange network error', { reason });
        throw new ExchangeError(`Network error contacting GitHub: ${reason}`);
      }

      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        logger.error('[GITHUB] Token exchange failed', {
          status: response.status,
          statusText: response.statusText,
        });
        throw new ExchangeError(
          `Token exchange failed (${response.status})${errorText ? `: ${errorText}` : ''}`,
          response.status,
        );
      }

      try {
        body = await response.json();
      } catch (err) {
        throw new ExchangeError(`Token exchange returned an unparsable body: ${describeFetchFailure(err, timed.signal)}`);
      }
    } finally {
      timed.dispose();
    }

    const parsed = gitHubTokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExchangeError('Token exchange returned an unexpected body');
    }

    const data = parsed.data;
    if (data.error) {
      logger.error('[GITHUB] Token exchange rejected', { error: data.error });
      throw new ExchangeError(`GitHub OAuth error: ${data.error_description || data.error}`);
    }
    if (!data.access_token) {
      throw new ExchangeError('Token exchange failed: no access_token in response');
    }

    logger.info('[GITHUB] Token exchange completed', {
      accessToken: describeToken(data.access_token),
      tokenType: data.token_type,
      scope: data.scope,
    });

    return {
      accessToken: data.access_token,
      tokenType: data.token_type || 'bearer',
      scope: data.scope || params.requestedScope || '',
    };
  }

  /**
   * Fetch the user the access token belongs to
   * @throws FetchError on network failure, timeout, HTTP error or bad body
   */
  async fetchIdentity(accessToken: string, options: RequestOptions = {}): Promise<Identity> {
    const timed = createTimedSignal(this.timeoutMs, options.signal);
    let body: unknown;
    try {
      let response: Response;
      try {
        response = await this.fetchImpl(this.userUrl, {
          method: 'GET',
          headers: {
            'Authorization': `Bearer ${accessToken}`,
            'Accept': 'application/vnd.github+json',
            'User-Agent': this.userAgent,
          },
          signal: timed.signal,
        });
      } catch (err) {
        const reason = describeFetchFailure(err, timed.signal);
        logger.error('[GITHUB] User lookup network error', { reason });
        throw new FetchError(`Network error contacting GitHub: ${reason}`);
      }

      if (!response.ok) {
        logger.error('[GITHUB] User lookup failed', {
          status: response.status,
          statusText: response.statusText,
        });
        throw new FetchError(`GitHub user lookup failed (${response.status} ${response.statusText})`, response.status);
      }

      try {
        body = await response.json();
      } catch (err) {
        throw new FetchError(`GitHub user lookup returned an unparsable body: ${describeFetchFailure(err, timed.signal)}`);
      }
    } finally {
      timed.dispose();
    }

    const parsed = gitHubUserSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError('GitHub user lookup returned an unexpected body');
    }

    logger.info('[GITHUB] User lookup completed', { login: parsed.data.login });
    return identityFromGitHubUser(parsed.data);
  }
}
