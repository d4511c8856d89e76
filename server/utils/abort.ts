/**
 * Abort helpers for outbound HTTP calls
 */

export interface TimedSignal {
  signal: AbortSignal;
  /** Stop the timer and detach from the parent signal */
  dispose(): void;
}

/**
 * Create a signal that aborts after `timeoutMs`, or as soon as `parent` aborts
 */
export function createTimedSignal(timeoutMs: number, parent?: AbortSignal): TimedSignal {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Describe why a fetch failed, preferring the abort reason when there is one
 */
export function describeFetchFailure(err: unknown, signal: AbortSignal): string {
  if (signal.aborted) {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) {
      return reason.message;
    }
    return 'Request was cancelled';
  }
  return err instanceof Error ? err.message : String(err);
}
