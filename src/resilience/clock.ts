import { CancelledError } from '../errors/categories.js';

/**
 * Time source for the resilience layer.
 * Every component reads time and sleeps through one of these, so tests can drive time by hand.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolves after `ms`, or rejects with CancelledError once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now(): number {
    return Date.now();
  },

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new CancelledError());
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },
};

/**
 * Throws CancelledError when the signal has already fired
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
