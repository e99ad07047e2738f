// ============================================================================
// Serial Queue
// ============================================================================
// The SDK dispatches each incoming request as soon as it is read. Requests
// within a session must run one at a time in arrival order, so every handler
// is chained onto the previous one.
// ============================================================================

export interface SerialQueue {
  run<T>(task: () => Promise<T>): Promise<T>;
  /** Tasks accepted but not yet settled */
  readonly pending: number;
}

export function createSerialQueue(): SerialQueue {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    run<T>(task: () => Promise<T>): Promise<T> {
      pending++;
      const result = tail.then(task);
      // Keep the chain alive whether the task resolves or rejects; the
      // caller still sees the rejection through `result`.
      tail = result.then(
        () => undefined,
        () => undefined
      );
      return result.finally(() => {
        pending--;
      });
    },
    get pending() {
      return pending;
    },
  };
}
