/**
 * Auth guard adapter for MCP tool handlers
 *
 * A guarded tool must not surface AuthenticationRequiredError as a protocol
 * error: clients show those as crashes. It becomes an `isError` tool result
 * carrying the login hint instead. Every other error propagates.
 */

import type { AuthFlow } from '../oauth/auth-flow.js';
import type { GuardedOperation } from '../oauth/auth-guard.js';
import { AuthenticationRequiredError } from '../oauth/errors.js';
import type { CallToolResult } from './mcp-types.js';
import { errorResult } from './tool-results.js';

export function guardTool<TArgs extends unknown[]>(
  authFlow: Pick<AuthFlow, 'guard'>,
  handler: GuardedOperation<TArgs, CallToolResult>,
): (...args: TArgs) => Promise<CallToolResult> {
  const run = authFlow.guard(handler);
  return async (...args: TArgs): Promise<CallToolResult> => {
    try {
      return await run(...args);
    } catch (error) {
      if (error instanceof AuthenticationRequiredError) {
        return errorResult(`🔒 ${error.message}`);
      }
      throw error;
    }
  };
}
