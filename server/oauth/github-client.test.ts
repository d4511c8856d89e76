/**
 * GitHub Client Tests
 *
 * Covers the authorization URL, the code exchange (including GitHub's
 * HTTP-200 error bodies) and the identity lookup, against a fetch mock.
 */

import { jsonResponse } from '../test-utils/http.js';
import { ConfigurationError, ExchangeError, FetchError } from './errors.js';
import { GITHUB_TOKEN_URL, GITHUB_USER_URL, GitHubClient } from './github-client.js';

const exchangeParams = {
  code: 'abc',
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:8000/auth/callback',
  requestedScope: 'read:user user:email',
};

/**
 * A fetch that never answers and rejects only when its signal aborts
 */
function hangUntilAborted(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (signal) {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    }
  });
}

describe('GitHubClient', () => {
  let fetchMock: jest.Mock<Promise<Response>, [string | URL | Request, RequestInit?]>;
  let client: GitHubClient;

  beforeEach(() => {
    fetchMock = jest.fn();
    client = new GitHubClient({ fetch: fetchMock, timeoutMs: 1000 });
  });

  describe('buildAuthorizationUrl', () => {
    it('should encode every parameter', () => {
      const url = new URL(
        client.buildAuthorizationUrl({
          clientId: 'test-client-id',
          redirectUri: 'http://localhost:8000/auth/callback',
          scopes: ['read:user', 'user:email'],
          state: 'state-123',
        }),
      );

      expect(`${url.origin}${url.pathname}`).toBe('https://github.com/login/oauth/authorize');
      expect(url.searchParams.get('client_id')).toBe('test-client-id');
      expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:8000/auth/callback');
      expect(url.searchParams.get('scope')).toBe('read:user user:email');
      expect(url.searchParams.get('state')).toBe('state-123');
    });

    it('should throw ConfigurationError when the client id is empty', () => {
      expect(() =>
        client.buildAuthorizationUrl({
          clientId: '',
          redirectUri: 'http://localhost:8000/auth/callback',
          scopes: [],
          state: 's',
        }),
      ).toThrow(ConfigurationError);
    });
  });

  describe('exchangeCodeForToken', () => {
    it('should post a form-encoded body with the required headers', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ access_token: 'tok1', token_type: 'bearer', scope: 'read:user' }));

      const token = await client.exchangeCodeForToken(exchangeParams);

      expect(token).toEqual({ accessToken: 'tok1', tokenType: 'bearer', scope: 'read:user' });
      expect(fetchMock).toHaveBeenCalledTimes(1);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(GITHUB_TOKEN_URL);
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({
        'Accept': 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': 'travel-itinerary-mcp',
      });

      const body = new URLSearchParams(String(init?.body));
      expect(body.get('client_id')).toBe('test-client-id');
      expect(body.get('client_secret')).toBe('test-secret');
      expect(body.get('code')).toBe('abc');
      expect(body.get('redirect_uri')).toBe('http://localhost:8000/auth/callback');
    });

    it('should default token type and scope', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ access_token: 'tok1' }));

      const token = await client.exchangeCodeForToken(exchangeParams);

      expect(token).toEqual({ accessToken: 'tok1', tokenType: 'bearer', scope: 'read:user user:email' });
    });

    it('should throw ExchangeError with the status on HTTP errors', async () => {
      fetchMock.mockResolvedValue(new Response('bad credentials', { status: 401 }));

      const error = await client.exchangeCodeForToken(exchangeParams).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ExchangeError);
      expect(error).toMatchObject({ status: 401, message: 'Token exchange failed (401): bad credentials' });
    });

    it('should throw ExchangeError for error bodies returned with HTTP 200', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ error: 'bad_verification_code', error_description: 'The code passed is incorrect or expired.' }),
      );

      await expect(client.exchangeCodeForToken(exchangeParams)).rejects.toThrow(
        'GitHub OAuth error: The code passed is incorrect or expired.',
      );
    });

    it('should throw ExchangeError when no access token is returned', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ token_type: 'bearer' }));

      await expect(client.exchangeCodeForToken(exchangeParams)).rejects.toThrow(
        'Token exchange failed: no access_token in response',
      );
    });

    it('should throw ExchangeError on network failure without retrying', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(client.exchangeCodeForToken(exchangeParams)).rejects.toThrow(
        'Network error contacting GitHub: fetch failed',
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should throw ExchangeError on an unparsable body', async () => {
      fetchMock.mockResolvedValue(new Response('<html>', { status: 200 }));

      await expect(client.exchangeCodeForToken(exchangeParams)).rejects.toBeInstanceOf(ExchangeError);
    });

    it('should abort when the caller signal is already aborted', async () => {
      fetchMock.mockImplementation(async (_url, init) => {
        if (init?.signal?.aborted) {
          throw new Error('This operation was aborted');
        }
        return jsonResponse({ access_token: 'tok1' });
      });
      const controller = new AbortController();
      controller.abort(new Error('Client disconnected'));

      await expect(client.exchangeCodeForToken(exchangeParams, { signal: controller.signal })).rejects.toThrow(
        'Network error contacting GitHub: Client disconnected',
      );
    });
  });

  describe('fetchIdentity', () => {
    it('should send the bearer token and map the profile', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({
          id: 42,
          login: 'alice',
          name: 'Alice',
          email: null,
          avatar_url: 'https://avatars.example.com/u/42',
          bio: '',
          company: 'Example Co',
          location: null,
          created_at: '2020-01-01T00:00:00Z',
        }),
      );

      const identity = await client.fetchIdentity('tok1');

      expect(identity).toEqual({
        id: '42',
        login: 'alice',
        name: 'Alice',
        email: undefined,
        avatarUrl: 'https://avatars.example.com/u/42',
        bio: undefined,
        company: 'Example Co',
        location: undefined,
        createdAt: '2020-01-01T00:00:00Z',
      });

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(GITHUB_USER_URL);
      expect(init?.headers).toEqual({
        'Authorization': 'Bearer tok1',
        'Accept': 'application/vnd.github+json',
        'User-Agent': 'travel-itinerary-mcp',
      });
    });

    it('should throw FetchError on HTTP errors', async () => {
      fetchMock.mockResolvedValue(new Response('', { status: 403, statusText: 'Forbidden' }));

      const error = await client.fetchIdentity('tok1').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({ status: 403, message: 'GitHub user lookup failed (403 Forbidden)' });
    });

    it('should throw FetchError when the body has no login', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ id: 42 }));

      await expect(client.fetchIdentity('tok1')).rejects.toThrow('GitHub user lookup returned an unexpected body');
    });
  });
  describe('timeouts', () => {
    it('should fail the code exchange with ExchangeError when GitHub does not answer', async () => {
      const slowClient = new GitHubClient({ fetch: jest.fn(hangUntilAborted), timeoutMs: 50 });

      const exchange = slowClient.exchangeCodeForToken(exchangeParams);

      await expect(exchange).rejects.toBeInstanceOf(ExchangeError);
      await expect(exchange).rejects.toThrow('Network error contacting GitHub: Request timed out after 50ms');
    });

    it('should fail the identity lookup with FetchError when GitHub does not answer', async () => {
      const slowClient = new GitHubClient({ fetch: jest.fn(hangUntilAborted), timeoutMs: 50 });

      const lookup = slowClient.fetchIdentity('tok1');

      await expect(lookup).rejects.toBeInstanceOf(FetchError);
      await expect(lookup).rejects.toThrow('Network error contacting GitHub: Request timed out after 50ms');
    });
  });
});
