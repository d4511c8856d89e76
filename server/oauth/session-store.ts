/**
 * In-memory Session Store
 *
 * Maps opaque session ids to authenticated sessions and tracks the single
 * "current" session of this process.
 *
 * The current-session pointer models one logical user per process, which
 * suits a locally-run MCP server. A multi-tenant deployment must key
 * sessions by a request-scoped identifier instead of using this pointer.
 *
 * WARNING: Sessions live in process memory and are lost on restart.
 */

import crypto from 'crypto';
import { logger } from '../observability/logger.js';
import { createMutex } from '../utils/mutex.js';
import type { Identity, Session } from './types.js';

export interface CreateSessionParams {
  identity: Identity;
  accessToken: string;
  tokenType: string;
  scope: string;
}

export interface SessionStoreOptions {
  now?: () => Date;
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private currentId: string | undefined;
  private readonly lock = createMutex();
  private readonly now: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Store a new session under a fresh id. Does not change the current session.
   */
  create(params: CreateSessionParams): Promise<Session> {
    return this.lock.runExclusive(() => this.insert(params));
  }

  /**
   * Store a new session and make it current in one critical section.
   * Resolves to undefined, storing nothing, if `signal` has aborted by the
   * time the section runs.
   */
  createCurrent(params: CreateSessionParams, signal?: AbortSignal): Promise<Session | undefined> {
    return this.lock.runExclusive(() => {
      if (signal?.aborted) {
        return undefined;
      }
      const session = this.insert(params);
      this.currentId = session.id;
      return session;
    });
  }

  private insert(params: CreateSessionParams): Session {
    const session: Session = Object.freeze({
      id: crypto.randomBytes(32).toString('base64url'),
      identity: params.identity,
      accessToken: params.accessToken,
      tokenType: params.tokenType,
      scope: params.scope,
      createdAt: this.now(),
    });
    this.sessions.set(session.id, session);

    logger.info('Session created', { login: session.identity.login, totalSessions: this.sessions.size });
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /**
   * Remove a session. Unknown ids are ignored.
   */
  delete(id: string): Promise<void> {
    return this.lock.runExclusive(() => {
      const existed = this.sessions.delete(id);
      if (this.currentId === id) {
        this.currentId = undefined;
      }
      if (existed) {
        logger.info('Session deleted', { remainingSessions: this.sessions.size });
      }
    });
  }

  setCurrent(id: string): Promise<void> {
    return this.lock.runExclusive(() => {
      if (!this.sessions.has(id)) {
        throw new Error('Cannot make an unknown session current');
      }
      this.currentId = id;
    });
  }

  getCurrent(): Session | undefined {
    const id = this.currentId;
    return id === undefined ? undefined : this.sessions.get(id);
  }

  /**
   * Delete the current session and clear the pointer
   * @returns the deleted session, or undefined when there was none
   */
  deleteCurrent(): Promise<Session | undefined> {
    return this.lock.runExclusive(() => {
      const id = this.currentId;
      this.currentId = undefined;
      if (id === undefined) {
        return undefined;
      }
      const session = this.sessions.get(id);
      this.sessions.delete(id);
      logger.info('Session deleted', { remainingSessions: this.sessions.size });
      return session;
    });
  }

  clearCurrent(): Promise<void> {
    return this.lock.runExclusive(() => {
      this.currentId = undefined;
    });
  }

  list(): Session[] {
    return Array.from(this.sessions.values());
  }

  /**
   * Remove every session and the current pointer
   * @returns number of sessions removed
   */
  clear(): Promise<number> {
    return this.lock.runExclusive(() => {
      const count = this.sessions.size;
      this.sessions.clear();
      this.currentId = undefined;
      return count;
    });
  }
}
