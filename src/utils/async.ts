/**
 * Timing utilities
 */
import type { Clock } from '../types';

/**
 * Resolve after `ms`, or as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wall clock backed by Date.now and setTimeout
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
