/**
 * EngagementEngine: one engagement attempt per call: fetch the target page,
 * choose a backend order, submit, fold the attempts into a SubmissionOutcome.
 *
 * Decision logic:
 * 1. Fetch the page (rate-limited) and look for a form in the static markup
 * 2. An explicit <form> found: static backend first, scripted as fallback
 * 3. Implicit form, no form, or fetch failure: scripted first, static as fallback
 * 4. Stop at the first submitted result; at most one swap
 * 5. On final failure report the last attempt, unless the browser was
 *    unavailable, in which case the first attempt explains more
 *
 * Normal failures are values in the outcome. Only cancellation, an invalid
 * target and missing configuration are thrown.
 */

import { randomUUID } from 'node:crypto';
import type { SubmissionBackend } from '../backends/types.js';
import type { Logger } from '../monitoring/logger.js';
import { getLogger } from '../monitoring/logger.js';
import type { MetricsCollector } from '../monitoring/metrics.js';
import type { RequestRateLimiter } from '../security/rateLimit.js';
import { CheerioDocument } from './dom/CheerioDocument.js';
import type { FormLocator } from './FormLocator.js';
import { HttpSession, type PageResult } from './HttpSession.js';
import { createSubmissionTarget } from './target.js';
import type {
  BackendAttempt,
  BackendResult,
  OutreachMessage,
  SubmissionOutcome,
  SubmissionTarget,
} from './types.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface EngagementEngineOptions {
  limiter: RequestRateLimiter;
  locator: FormLocator;
  staticBackend: SubmissionBackend;
  /** Absent when the scripted backend is disabled */
  scriptedBackend?: SubmissionBackend;
  fetchTimeoutMs: number;
  metrics?: MetricsCollector;
  logger?: Logger;
}

export interface EngageOptions {
  /** Cancels the attempt; the engage() promise rejects with the abort reason */
  signal?: AbortSignal;
}

// ── Implementation ──────────────────────────────────────────────────────

export class EngagementEngine {
  private readonly log: Logger;

  constructor(private readonly options: EngagementEngineOptions) {
    this.log = (options.logger ?? getLogger()).child({ component: 'engagement-engine' });
  }

  async engage(url: string, message: OutreachMessage, opts: EngageOptions = {}): Promise<SubmissionOutcome> {
    const { signal } = opts;
    const target = createSubmissionTarget(url);
    signal?.throwIfAborted();

    const startedAt = Date.now();
    const log = this.log.child({ attemptId: randomUUID(), domain: target.domain });
    const session = new HttpSession({ timeoutMs: this.options.fetchTimeoutMs, signal });

    await this.options.limiter.acquire(target.domain, signal);
    const page = await session.getPage(target.url);
    if (!page.ok) {
      log.warn('Target page fetch failed', { url: target.url, reason: page.reason });
    }

    const order = await this.backendOrder(page);
    log.info('Engagement started', { url: target.url, order: order.map((b) => b.kind) });

    const results: BackendResult[] = [];
    const attempts: BackendAttempt[] = [];

    for (const backend of order) {
      const attemptStart = Date.now();
      const result = await backend.submit({ target, message, session, page, signal, logger: log });
      results.push(result);
      attempts.push({
        backend: result.backend,
        submitted: result.submitted,
        error: result.error,
        durationMs: Date.now() - attemptStart,
      });

      if (result.submitted) break;
      log.info('Backend attempt failed', { backend: result.backend, code: result.error?.code });
    }

    const outcome = this.fold(target, results, attempts, startedAt);
    this.options.metrics?.recordOutcome(outcome);

    log.info('Engagement finished', {
      submitted: outcome.submitted,
      backend: outcome.backend,
      code: outcome.error?.code,
      signal: outcome.signal,
      durationMs: outcome.durationMs,
    });
    return outcome;
  }

  /**
   * Backends in the order they should be tried for this page. An explicit
   * form in the static markup favours the cheap static replay.
   */
  async backendOrder(page: PageResult): Promise<SubmissionBackend[]> {
    const { staticBackend, scriptedBackend } = this.options;
    if (!scriptedBackend) return [staticBackend];

    if (page.ok) {
      const form = await this.options.locator.locate(new CheerioDocument(page.html, page.url));
      if (form && !form.implicit) return [staticBackend, scriptedBackend];
    }
    return [scriptedBackend, staticBackend];
  }

  private fold(
    target: SubmissionTarget,
    results: BackendResult[],
    attempts: BackendAttempt[],
    startedAt: number,
  ): SubmissionOutcome {
    const last = results[results.length - 1];
    const first = results[0];
    const reported =
      !last.submitted && last.error?.code === 'backend_unavailable' && results.length > 1 ? first : last;

    return {
      submitted: reported.submitted,
      backend: reported.backend,
      target,
      challenge: results.find((r) => r.challenge)?.challenge,
      error: reported.submitted ? undefined : reported.error,
      signal: reported.signal,
      status: reported.status,
      attempts,
      durationMs: Date.now() - startedAt,
      finishedAt: new Date().toISOString(),
    };
  }
}
