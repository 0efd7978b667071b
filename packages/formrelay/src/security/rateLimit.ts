import type { RateLimitConfig } from '../config/engine.js';
import { abortable } from '../lib/abort.js';
import { systemClock, type Clock } from '../lib/clock.js';
import { getLogger } from '../monitoring/logger.js';

// ─── Spacing store ─────────────────────────────────────────────────
// In-memory, process lifetime. One entry for the global key, one per domain.

const GLOBAL_KEY = 'global';

function domainKey(domain: string): string {
  return `domain:${domain.toLowerCase()}`;
}

/**
 * Minimum-interval limiter for outbound requests.
 *
 * Every request to a destination calls `acquire(domain)`, which waits for the
 * global interval and then the per-domain interval. Callers on the same key are
 * queued in arrival order; callers on different domains never wait on each
 * other except through the global key.
 */
export class RequestRateLimiter {
  private readonly lastRequestAt = new Map<string, number>();
  private readonly queues = new Map<string, Promise<void>>();
  private readonly globalIntervalMs: number;
  private readonly domainIntervalMs: number;
  private readonly log = getLogger().child({ component: 'rate-limiter' });

  constructor(
    config: RateLimitConfig,
    private readonly clock: Clock = systemClock,
  ) {
    if (config.globalQps <= 0 || config.perDomainQps <= 0) {
      throw new RangeError('Rate limits must be positive (requests per second)');
    }
    this.globalIntervalMs = 1000 / config.globalQps;
    this.domainIntervalMs = 1000 / config.perDomainQps;
  }

  /** Wait until the global interval has elapsed since the last request anywhere. */
  wait(signal?: AbortSignal): Promise<void> {
    return this.enqueue(GLOBAL_KEY, this.globalIntervalMs, signal);
  }

  /** Wait until the per-domain interval has elapsed for `domain`. Domain spacing only. */
  waitForDomain(domain: string, signal?: AbortSignal): Promise<void> {
    return this.enqueue(domainKey(domain), this.domainIntervalMs, signal);
  }

  async acquire(domain: string, signal?: AbortSignal): Promise<void> {
    await this.wait(signal);
    await this.waitForDomain(domain, signal);
  }

  /** Timestamp of the last granted request for `domain`, or undefined. */
  lastRequestFor(domain: string): number | undefined {
    return this.lastRequestAt.get(domainKey(domain));
  }

  private enqueue(key: string, intervalMs: number, signal?: AbortSignal): Promise<void> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const turn = previous.then(() => this.space(key, intervalMs, signal));
    // The queue only orders turns; each caller sees its own rejection through `turn`.
    this.queues.set(
      key,
      turn.then(
        () => undefined,
        () => undefined,
      ),
    );
    return abortable(turn, signal);
  }

  private async space(key: string, intervalMs: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const last = this.lastRequestAt.get(key);
    if (last !== undefined) {
      const remaining = intervalMs - (this.clock.now() - last);
      if (remaining > 0) {
        this.log.debug('Rate limit wait', { key, waitMs: Math.round(remaining) });
        await this.clock.sleep(remaining, signal);
      }
    }

    this.lastRequestAt.set(key, this.clock.now());
  }
}
