import { guarded, type AuthenticatedContext } from './auth-guard.js';
import { AuthenticationRequiredError } from './errors.js';
import { SessionStore } from './session-store.js';

describe('guarded', () => {
  let sessions: SessionStore;

  beforeEach(() => {
    sessions = new SessionStore({ now: () => new Date('2025-01-15T08:30:00Z') });
  });

  it('should not invoke the operation without a current session', async () => {
    const operation = jest.fn(async () => 'secret data');
    const protectedOp = guarded(sessions, operation);

    await expect(protectedOp()).rejects.toBeInstanceOf(AuthenticationRequiredError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('should invoke the operation with the identity and forwarded arguments', async () => {
    const session = await sessions.create({
      identity: { id: '42', login: 'alice' },
      accessToken: 'tok1',
      tokenType: 'bearer',
      scope: 'read:user',
    });
    await sessions.setCurrent(session.id);

    const operation = jest.fn(async (auth: AuthenticatedContext, greeting: string) => {
      return `${greeting}, @${auth.identity.login}`;
    });
    const protectedOp = guarded(sessions, operation);

    await expect(protectedOp('Hello')).resolves.toBe('Hello, @alice');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should never hand the access token to the operation', async () => {
    const session = await sessions.create({
      identity: { id: '42', login: 'alice' },
      accessToken: 'tok1',
      tokenType: 'bearer',
      scope: 'read:user',
    });
    await sessions.setCurrent(session.id);

    const seen = await guarded(sessions, async (auth) => auth)();

    expect(JSON.stringify(seen)).not.toContain('tok1');
    expect(seen.session).not.toHaveProperty('accessToken');
  });

  it('should check the session at call time, not at wrap time', async () => {
    const operation = jest.fn(async () => 'ok');
    const protectedOp = guarded(sessions, operation);

    const session = await sessions.create({
      identity: { id: '42', login: 'alice' },
      accessToken: 'tok1',
      tokenType: 'bearer',
      scope: 'read:user',
    });
    await sessions.setCurrent(session.id);
    await expect(protectedOp()).resolves.toBe('ok');

    await sessions.clearCurrent();
    await expect(protectedOp()).rejects.toThrow("Authentication required. Please login with GitHub first using the 'github_login' tool.");
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
