export type Sleep = (ms: number) => Promise<void>;

/** Runs one task at a time, at least `delayMs` after the previous one settled. */
export type Throttle = <T>(task: () => Promise<T>) => Promise<T>;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Spaces tasks so that `delayMs` of idle time passes between one task settling
 * and the next starting, failures included. Concurrent callers queue behind
 * each other, so one throttle stands for one connection.
 */
export function createThrottle(delayMs: number, wait: Sleep = sleep): Throttle {
  let lastSettled: number | undefined;
  let chain = Promise.resolve();
  return async <T>(task: () => Promise<T>): Promise<T> => {
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const prev = chain;
    chain = chain.then(() => current);
    await prev;

    try {
      const remaining = lastSettled === undefined ? 0 : Math.max(0, lastSettled + delayMs - Date.now());
      if (remaining > 0) {
        await wait(remaining);
      }
      return await task();
    } finally {
      lastSettled = Date.now();
      release();
    }
  };
}
