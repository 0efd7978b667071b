import { setTimeout as delay } from 'node:timers/promises';

/**
 * Time source for everything that waits: the rate limiter and CAPTCHA polling.
 * Tests swap in a clock whose sleep advances a counter instead of blocking.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    if (ms <= 0) {
      signal?.throwIfAborted();
      return;
    }
    await delay(ms, undefined, { signal });
  },
};
