export interface Pacer {
  /** Resolve once enough time has passed since the previous call. */
  wait(signal?: AbortSignal): Promise<void>;
}

export interface PacerOptions {
  minDelayMs: number;
  maxDelayMs: number;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Randomized minimum spacing between page fetches. The first call returns
 * immediately; calls are serialized, so callers sharing one pacer queue up.
 */
export function createPacer(options: PacerOptions): Pacer {
  const random = options.random ?? Math.random;
  const doSleep = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  let last = 0;
  let chain: Promise<void> = Promise.resolve();

  return {
    async wait(signal?: AbortSignal): Promise<void> {
      const prev = chain;
      let release = () => {};
      chain = new Promise<void>(resolve => {
        release = resolve;
      });
      await prev;

      try {
        const span = Math.max(0, options.maxDelayMs - options.minDelayMs);
        const delay = options.minDelayMs + Math.round(random() * span);
        const wait = Math.max(0, last + delay - now());
        if (wait > 0) {
          await doSleep(wait, signal);
        }
        last = now();
      } finally {
        release();
      }
    }
  };
}

/** A pacer that never waits. */
export const noPacing: Pacer = {
  wait: async () => {}
};
