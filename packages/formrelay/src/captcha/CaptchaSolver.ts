import type { CaptchaConfig } from '../config/engine.js';
import { EngineConfigurationError, errorMessage } from '../engine/errors.js';
import { systemClock, type Clock } from '../lib/clock.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { MetricsCollector } from '../monitoring/metrics.js';
import type {
  CaptchaKind,
  CaptchaResolution,
  CaptchaSolverProvider,
  DetectedChallenge,
  InteractiveCaptchaKind,
  PollResult,
} from './types.js';

export type PollingConfig = Pick<CaptchaConfig, 'pollIntervalMs' | 'imageMaxPolls' | 'interactiveMaxPolls'>;

export type ImageLoader = (url: string) => Promise<Uint8Array>;

export interface CaptchaSolverOptions {
  clock?: Clock;
  metrics?: MetricsCollector;
  logger?: Logger;
}

/**
 * Drives a CaptchaSolverProvider through submit → poll.
 *
 * The solver sleeps one poll interval before every poll and stops after the
 * configured number of polls (image and interactive challenges have separate
 * bounds). A pending poll keeps going; any other non-success, including a
 * thrown provider error, ends the solve at once as `solver_error`. Cancelling
 * the signal rejects with the abort reason.
 */
export class CaptchaSolver {
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly provider: CaptchaSolverProvider | null,
    private readonly polling: PollingConfig,
    private readonly opts: CaptchaSolverOptions = {},
  ) {
    this.clock = opts.clock ?? systemClock;
    this.log = (opts.logger ?? getLogger()).child({ component: 'captcha-solver' });
  }

  get configured(): boolean {
    return this.provider !== null;
  }

  async solveImage(image: Uint8Array, signal?: AbortSignal): Promise<CaptchaResolution> {
    const provider = this.requireProvider();
    return this.run('image', this.polling.imageMaxPolls, () => provider.submitImageJob(image, signal), signal);
  }

  async solveInteractive(
    kind: InteractiveCaptchaKind,
    siteKey: string,
    pageUrl: string,
    signal?: AbortSignal,
  ): Promise<CaptchaResolution> {
    const provider = this.requireProvider();
    return this.run(
      kind,
      this.polling.interactiveMaxPolls,
      () => provider.submitInteractiveJob({ kind, siteKey, pageUrl }, signal),
      signal,
    );
  }

  /**
   * Resolve a detected challenge. `loadImage` fetches an image challenge's
   * bytes; callers pass one bound to the session that will submit the answer.
   */
  async resolve(
    challenge: DetectedChallenge,
    pageUrl: string,
    loadImage: ImageLoader,
    signal?: AbortSignal,
  ): Promise<CaptchaResolution> {
    this.requireProvider();

    switch (challenge.kind) {
      case 'recaptcha_v2':
      case 'hcaptcha':
        if (!challenge.siteKey) {
          return this.fail(challenge.kind, `${challenge.kind} widget has no site key`, 0);
        }
        return this.solveInteractive(challenge.kind, challenge.siteKey, pageUrl, signal);

      case 'image': {
        if (!challenge.imageSource) {
          return this.fail('image', 'image challenge has no source', 0);
        }
        let image: Uint8Array;
        try {
          image = await loadImage(new URL(challenge.imageSource, pageUrl).href);
        } catch (err) {
          if (signal?.aborted) throw err;
          return this.fail('image', `could not load challenge image: ${errorMessage(err)}`, 0);
        }
        return this.solveImage(image, signal);
      }

      case 'unknown':
        return this.fail('unknown', 'challenge type not recognized', 0);
    }
  }

  // --- Internal ---

  private requireProvider(): CaptchaSolverProvider {
    if (!this.provider) {
      throw new EngineConfigurationError(
        'A CAPTCHA challenge was found but no solver is configured (set CAPTCHA_API_KEY)',
        'CAPTCHA_API_KEY',
      );
    }
    return this.provider;
  }

  private async run(
    kind: CaptchaKind,
    maxPolls: number,
    submit: () => Promise<string>,
    signal?: AbortSignal,
  ): Promise<CaptchaResolution> {
    const provider = this.requireProvider();
    const startedAt = this.clock.now();
    const elapsed = () => this.clock.now() - startedAt;

    let jobId: string;
    try {
      jobId = await submit();
    } catch (err) {
      if (signal?.aborted) throw err;
      return this.fail(kind, `submit failed: ${errorMessage(err)}`, elapsed());
    }

    this.log.info('CAPTCHA job submitted', { kind, provider: provider.name, jobId, maxPolls });

    for (let poll = 1; poll <= maxPolls; poll++) {
      await this.clock.sleep(this.polling.pollIntervalMs, signal);

      let result: PollResult;
      try {
        result = await provider.pollJob(jobId, signal);
      } catch (err) {
        if (signal?.aborted) throw err;
        return this.fail(kind, `poll failed: ${errorMessage(err)}`, elapsed());
      }

      if (result.status === 'pending') continue;
      if (result.status === 'failed') {
        return this.fail(kind, result.reason, elapsed());
      }

      const latencyMs = elapsed();
      this.opts.metrics?.recordCaptchaSolved(latencyMs);
      this.log.info('CAPTCHA solved', { kind, provider: provider.name, polls: poll, latencyMs });
      return {
        state: 'solved',
        solution: { kind, token: result.token, latencyMs, provider: provider.name },
      };
    }

    const latencyMs = elapsed();
    this.opts.metrics?.recordCaptchaFailed('timed_out');
    this.log.warn('CAPTCHA solve timed out', { kind, provider: provider.name, polls: maxPolls, latencyMs });
    return { state: 'timed_out', polls: maxPolls, latencyMs };
  }

  private fail(kind: CaptchaKind, reason: string, latencyMs: number): CaptchaResolution {
    this.opts.metrics?.recordCaptchaFailed('solver_error');
    this.log.warn('CAPTCHA solver error', { kind, reason });
    return { state: 'solver_error', reason, latencyMs };
  }
}
