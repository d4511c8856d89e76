/**
 * Promise-chain mutex
 *
 * Runs critical sections one at a time, in the order they were requested.
 * Unlike a plain promise queue, a failed section does not poison the
 * sections queued behind it.
 *
 * @example
 * ```typescript
 * const lock = createMutex();
 * await lock.runExclusive(() => {
 *   store.set(id, record);
 * });
 * ```
 */
export interface Mutex {
  runExclusive<T>(section: () => T | Promise<T>): Promise<T>;
}

export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve();

  return {
    runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
      const result = tail.then(section);
      // Next section waits for this one to settle, whatever the outcome
      tail = result.then(
        () => undefined,
        () => undefined,
      );
      return result;
    },
  };
}
