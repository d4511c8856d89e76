/**
 * AuthFlow Tests
 *
 * End-to-end login scenarios against an in-process GitHub stub:
 * A. successful login makes a current session and consumes the state
 * B. unknown state is rejected before any network call
 * C. logout after login leaves nobody authenticated
 * D. a failing token endpoint leaves no session and still consumes the state
 */

import { createTestAuthFlow, loginAs, TEST_SETTINGS } from '../test-utils/github-stub.js';
import { maskClientId } from './auth-flow.js';
import { ConfigurationError, ExchangeError, FetchError, InvalidStateError } from './errors.js';

describe('AuthFlow', () => {
  describe('scenario A: successful login', () => {
    it('should create a current session for the GitHub user and consume the state', async () => {
      const flow = createTestAuthFlow({
        tokenBody: { access_token: 'tok1' },
        userBody: { id: '42', login: 'alice' },
      });
      const { url, state } = flow.authFlow.startLogin();

      expect(new URL(url).searchParams.get('state')).toBe(state);

      const view = await flow.authFlow.completeLogin({ code: 'abc', state });

      expect(view.identity).toEqual({ id: '42', login: 'alice' });
      expect(view).not.toHaveProperty('accessToken');
      expect(flow.sessions.getCurrent()?.identity.login).toBe('alice');
      expect(flow.sessions.getCurrent()?.accessToken).toBe('tok1');
      expect(flow.states.validate(state)).toBe(false);
      expect(flow.fetchStub).toHaveBeenCalledTimes(2);
    });

    it('should fall back to the requested scope when GitHub omits one', async () => {
      const flow = createTestAuthFlow({ tokenBody: { access_token: 'tok1' } });

      const view = await loginAs(flow);

      expect(view.scope).toBe('read:user user:email');
      expect(view.tokenType).toBe('bearer');
    });
  });

  describe('scenario B: unknown state', () => {
    it('should throw InvalidStateError without contacting GitHub', async () => {
      const flow = createTestAuthFlow();

      await expect(flow.authFlow.completeLogin({ code: 'abc', state: 'forged' })).rejects.toBeInstanceOf(
        InvalidStateError,
      );
      expect(flow.fetchStub).not.toHaveBeenCalled();
      expect(flow.sessions.list()).toEqual([]);
      expect(flow.authFlow.status()).toEqual({ authenticated: false });
    });

    it('should reject a replayed state', async () => {
      const flow = createTestAuthFlow();
      const { state } = flow.authFlow.startLogin();
      await flow.authFlow.completeLogin({ code: 'abc', state });

      await expect(flow.authFlow.completeLogin({ code: 'abc', state })).rejects.toBeInstanceOf(InvalidStateError);
      expect(flow.sessions.list()).toHaveLength(1);
    });
  });

  describe('scenario C: logout', () => {
    it('should leave nobody authenticated', async () => {
      const flow = createTestAuthFlow();
      await loginAs(flow);

      await expect(flow.authFlow.logout()).resolves.toEqual({ loggedOut: true, login: 'alice' });
      expect(flow.sessions.getCurrent()).toBeUndefined();
      expect(flow.sessions.list()).toEqual([]);
      expect(flow.authFlow.status()).toEqual({ authenticated: false });
    });

    it('should not clear a session made current while logging out', async () => {
      const flow = createTestAuthFlow();
      await loginAs(flow);
      const bob = await flow.sessions.create({
        identity: { id: '7', login: 'bob' },
        accessToken: 'tok2',
        tokenType: 'bearer',
        scope: 'read:user',
      });

      const logout = flow.authFlow.logout();
      const switched = flow.sessions.setCurrent(bob.id);
      await Promise.all([logout, switched]);

      await expect(logout).resolves.toEqual({ loggedOut: true, login: 'alice' });
      expect(flow.sessions.getCurrent()?.identity.login).toBe('bob');
      expect(flow.authFlow.status()).toMatchObject({ authenticated: true });
    });

    it('should be idempotent', async () => {
      const flow = createTestAuthFlow();

      await expect(flow.authFlow.logout()).resolves.toEqual({ loggedOut: false });
      await expect(flow.authFlow.logout()).resolves.toEqual({ loggedOut: false });
    });
  });

  describe('scenario D: token endpoint failure', () => {
    it('should throw ExchangeError, create no session and keep the state consumed', async () => {
      const flow = createTestAuthFlow({ tokenStatus: 401, tokenBody: { message: 'Bad credentials' } });
      const { state } = flow.authFlow.startLogin();

      const error = await flow.authFlow.completeLogin({ code: 'abc', state }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ExchangeError);
      expect(error).toMatchObject({ status: 401 });
      expect(flow.sessions.list()).toEqual([]);
      expect(flow.sessions.getCurrent()).toBeUndefined();
      expect(flow.states.validate(state)).toBe(false);
    });

    it('should propagate FetchError from the identity lookup', async () => {
      const flow = createTestAuthFlow({ userStatus: 500 });
      const { state } = flow.authFlow.startLogin();

      await expect(flow.authFlow.completeLogin({ code: 'abc', state })).rejects.toBeInstanceOf(FetchError);
      expect(flow.sessions.list()).toEqual([]);
    });
  });

  describe('cancellation', () => {
    it('should not create a session when the signal aborts during the lookup', async () => {
      const flow = createTestAuthFlow();
      const controller = new AbortController();
      const stub = flow.fetchStub.getMockImplementation();
      flow.fetchStub.mockImplementation(async (input, init) => {
        const response = await (stub ? stub(input, init) : Promise.reject(new Error('no stub')));
        controller.abort(new Error('Client disconnected'));
        return response;
      });
      const { state } = flow.authFlow.startLogin();

      await expect(
        flow.authFlow.completeLogin({ code: 'abc', state }, { signal: controller.signal }),
      ).rejects.toBeInstanceOf(ExchangeError);
      expect(flow.sessions.list()).toEqual([]);
    });
  });

  describe('configuration', () => {
    const missingSecret = { ...TEST_SETTINGS, clientSecret: undefined };

    it('should throw ConfigurationError from startLogin without issuing a state', () => {
      const flow = createTestAuthFlow({}, missingSecret);

      expect(() => flow.authFlow.startLogin()).toThrow(ConfigurationError);
      expect(flow.states.size()).toBe(0);
    });

    it('should name the missing variables', () => {
      const flow = createTestAuthFlow({}, { scopes: [] });

      expect(() => flow.authFlow.checkConfiguration()).toThrow(
        'Missing GitHub OAuth configuration. Please set:\n- GITHUB_CLIENT_ID\n- GITHUB_CLIENT_SECRET\n- GITHUB_REDIRECT_URI',
      );
    });

    it('should return a masked configuration', () => {
      const flow = createTestAuthFlow();

      expect(flow.authFlow.checkConfiguration()).toEqual({
        clientId: 'test-cli...0001',
        redirectUri: 'http://localhost:8000/auth/callback',
        scopes: ['read:user', 'user:email'],
      });
    });
  });

  describe('debugSessions', () => {
    it('should list sessions without tokens and mark the current one', async () => {
      const flow = createTestAuthFlow();
      const view = await loginAs(flow);

      const info = flow.authFlow.debugSessions();

      expect(info.total).toBe(1);
      expect(info.currentId).toBe(view.id);
      expect(JSON.stringify(info)).not.toContain('tok1');
    });
  });

  describe('maskClientId', () => {
    it('should keep the first 8 and last 4 characters of long ids', () => {
      expect(maskClientId('Iv1.abcdef1234567890')).toBe('Iv1.abcd...7890');
    });

    it('should keep only a prefix of short ids', () => {
      expect(maskClientId('abcdefgh')).toBe('abcd...');
    });
  });
});
