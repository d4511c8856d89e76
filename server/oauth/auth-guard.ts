/**
 * Auth Guard
 *
 * Higher-order wrapper that runs an operation only when a user is logged in.
 * The wrapped operation receives the current identity and a token-free view
 * of the session as its first argument.
 *
 * @example
 * ```typescript
 * const whoami = guarded(sessions, async ({ identity }) => `@${identity.login}`);
 * await whoami(); // throws AuthenticationRequiredError when logged out
 * ```
 */

import { AuthenticationRequiredError } from './errors.js';
import type { SessionStore } from './session-store.js';
import { toSessionView, type Identity, type SessionView } from './types.js';

export interface AuthenticatedContext {
  identity: Identity;
  session: SessionView;
}

export type GuardedOperation<TArgs extends unknown[], TResult> = (
  auth: AuthenticatedContext,
  ...args: TArgs
) => TResult | Promise<TResult>;

/**
 * Wrap `operation` so that it fails with AuthenticationRequiredError, without
 * being invoked, whenever there is no current session at call time
 */
export function guarded<TArgs extends unknown[], TResult>(
  sessions: Pick<SessionStore, 'getCurrent'>,
  operation: GuardedOperation<TArgs, TResult>,
): (...args: TArgs) => Promise<TResult> {
  return async (...args: TArgs): Promise<TResult> => {
    const session = sessions.getCurrent();
    if (!session) {
      throw new AuthenticationRequiredError();
    }
    const view = toSessionView(session);
    return operation({ identity: view.identity, session: view }, ...args);
  };
}
