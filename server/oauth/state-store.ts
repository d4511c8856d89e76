/**
 * OAuth State Store
 *
 * Issues the anti-CSRF `state` values embedded in GitHub authorization URLs
 * and validates them when the callback arrives.
 *
 * - Values are 32 random bytes, base64url-encoded
 * - A value validates successfully at most once (deleted on first use)
 * - Values expire after `ttlMs` (10 minutes by default) even if never used
 * - Expired values are swept lazily on every validate call
 */

import crypto from 'crypto';
import { logger } from '../observability/logger.js';
import type { StateToken } from './types.js';

export const DEFAULT_STATE_TTL_MS = 10 * 60 * 1000;

export interface StateStoreOptions {
  ttlMs?: number;
  /** Clock override, in epoch milliseconds */
  now?: () => number;
}

export class StateStore {
  private readonly states = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: StateStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_STATE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  issue(): StateToken {
    const value = crypto.randomBytes(32).toString('base64url');
    const issuedAt = this.now();
    this.states.set(value, issuedAt);

    logger.debug('Issued OAuth state', { expiresInSeconds: this.ttlMs / 1000, pending: this.states.size });
    return { value, issuedAt };
  }

  /**
   * Consume a state value
   * @returns true only for a known, unexpired, not-yet-used value
   */
  validate(value: string): boolean {
    const now = this.now();
    const issuedAt = this.states.get(value);
    this.states.delete(value);
    this.evictExpired(now);

    if (issuedAt === undefined) {
      logger.warn('OAuth state not found (unknown or already used)');
      return false;
    }

    if (now - issuedAt > this.ttlMs) {
      logger.warn('OAuth state expired', { ageSeconds: Math.round((now - issuedAt) / 1000) });
      return false;
    }

    return true;
  }

  size(): number {
    return this.states.size;
  }

  clear(): void {
    this.states.clear();
  }

  private evictExpired(now: number): void {
    let expiredCount = 0;
    for (const [value, issuedAt] of this.states) {
      if (now - issuedAt > this.ttlMs) {
        this.states.delete(value);
        expiredCount++;
      }
    }
    if (expiredCount > 0) {
      logger.debug('Evicted expired OAuth states', { expiredCount });
    }
  }
}
