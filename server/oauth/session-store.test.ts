import { SessionStore } from './session-store.js';
import type { Identity } from './types.js';

const alice: Identity = { id: '42', login: 'alice', name: 'Alice' };
const bob: Identity = { id: '7', login: 'bob' };

function params(identity: Identity, accessToken = 'tok1') {
  return { identity, accessToken, tokenType: 'bearer', scope: 'read:user' };
}

describe('SessionStore', () => {
  let store: SessionStore;
  const createdAt = new Date('2025-01-15T08:30:00Z');

  beforeEach(() => {
    store = new SessionStore({ now: () => createdAt });
  });

  it('should create a session retrievable by id', async () => {
    const session = await store.create(params(alice));

    expect(session.id).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(session.createdAt).toEqual(createdAt);
    expect(store.get(session.id)).toEqual({
      id: session.id,
      identity: alice,
      accessToken: 'tok1',
      tokenType: 'bearer',
      scope: 'read:user',
      createdAt,
    });
  });

  it('should not change the current session on create', async () => {
    await store.create(params(alice));
    expect(store.getCurrent()).toBeUndefined();
  });

  it('should return undefined after delete', async () => {
    const session = await store.create(params(alice));
    await store.delete(session.id);

    expect(store.get(session.id)).toBeUndefined();
  });

  it('should treat deleting an unknown id as a no-op', async () => {
    const session = await store.create(params(alice));

    await expect(store.delete('missing')).resolves.toBeUndefined();
    await expect(store.delete('missing')).resolves.toBeUndefined();
    expect(store.get(session.id)).toBeDefined();
  });

  it('should track the current session', async () => {
    const first = await store.create(params(alice));
    const second = await store.create(params(bob, 'tok2'));

    await store.setCurrent(first.id);
    expect(store.getCurrent()?.identity.login).toBe('alice');

    await store.setCurrent(second.id);
    expect(store.getCurrent()?.identity.login).toBe('bob');

    await store.clearCurrent();
    expect(store.getCurrent()).toBeUndefined();
    expect(store.list()).toHaveLength(2);
  });

  it('should refuse to make an unknown session current', async () => {
    await expect(store.setCurrent('missing')).rejects.toThrow('Cannot make an unknown session current');
    expect(store.getCurrent()).toBeUndefined();
  });

  it('should clear the pointer when the current session is deleted', async () => {
    const session = await store.create(params(alice));
    await store.setCurrent(session.id);
    await store.delete(session.id);

    expect(store.getCurrent()).toBeUndefined();
  });

  it('should keep the pointer when another session is deleted', async () => {
    const current = await store.create(params(alice));
    const other = await store.create(params(bob, 'tok2'));
    await store.setCurrent(current.id);
    await store.delete(other.id);

    expect(store.getCurrent()?.id).toBe(current.id);
  });

  it('should clear every session and report the count', async () => {
    const session = await store.create(params(alice));
    await store.create(params(bob, 'tok2'));
    await store.setCurrent(session.id);

    await expect(store.clear()).resolves.toBe(2);
    expect(store.list()).toEqual([]);
    expect(store.getCurrent()).toBeUndefined();
  });

  it('should serialize concurrent mutations', async () => {
    const created = await Promise.all([
      store.create(params(alice)),
      store.create(params(bob, 'tok2')),
      store.create(params(alice, 'tok3')),
    ]);
    await Promise.all(created.map((session) => store.setCurrent(session.id)));

    expect(new Set(created.map((session) => session.id)).size).toBe(3);
    expect(store.getCurrent()?.id).toBe(created[2].id);
  });

  it('should create and activate a session in one step', async () => {
    await store.create(params(bob, 'tok2'));

    const session = await store.createCurrent(params(alice));

    expect(session?.identity.login).toBe('alice');
    expect(store.getCurrent()?.id).toBe(session?.id);
    expect(store.list()).toHaveLength(2);
  });

  it('should store nothing when the signal aborts while createCurrent is queued', async () => {
    const controller = new AbortController();

    const pending = store.createCurrent(params(alice), controller.signal);
    controller.abort();

    await expect(pending).resolves.toBeUndefined();
    expect(store.list()).toEqual([]);
    expect(store.getCurrent()).toBeUndefined();
  });

  it('should delete the current session and return it', async () => {
    const current = await store.createCurrent(params(alice));
    const other = await store.create(params(bob, 'tok2'));

    await expect(store.deleteCurrent()).resolves.toBe(current);
    expect(store.getCurrent()).toBeUndefined();
    expect(store.list()).toEqual([other]);
    await expect(store.deleteCurrent()).resolves.toBeUndefined();
  });

  it('should keep a session made current after deleteCurrent was queued', async () => {
    await store.createCurrent(params(alice));
    const other = await store.create(params(bob, 'tok2'));

    const deleted = store.deleteCurrent();
    const switched = store.setCurrent(other.id);
    await Promise.all([deleted, switched]);

    expect(store.getCurrent()?.identity.login).toBe('bob');
  });

  it('should return frozen sessions', async () => {
    const session = await store.create(params(alice));
    expect(Object.isFrozen(session)).toBe(true);
  });
});
