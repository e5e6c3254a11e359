/**
 * Promise-chain mutex. Tasks run one at a time in call order; a failing task
 * releases the lock like a succeeding one.
 */
export type Mutex = { run<T>(fn: () => Promise<T> | T): Promise<T> };

export function createMutex(): Mutex {
  let chain: Promise<void> = Promise.resolve();
  return {
    run<T>(fn: () => Promise<T> | T): Promise<T> {
      const next = chain.then(fn, fn);
      chain = next.then(
        () => undefined,
        () => undefined
      );
      return next;
    },
  };
}
