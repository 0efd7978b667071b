import { describe, expect, test, vi } from 'vitest';
import { MetricsCollector } from '../../../src/monitoring/metrics.js';
import { outcome } from '../../fixtures/outcomes.js';

describe('MetricsCollector', () => {
  test('counts outcomes, codes and backend usage', () => {
    const metrics = new MetricsCollector();

    metrics.recordOutcome(outcome('https://a.test/', { durationMs: 100 }));
    metrics.recordOutcome(
      outcome('https://b.test/', {
        submitted: false,
        backend: 'scripted',
        error: { code: 'no_form_found', message: 'No contact form found on https://b.test/' },
        attempts: [
          { backend: 'static', submitted: false, durationMs: 50 },
          { backend: 'scripted', submitted: false, durationMs: 250 },
        ],
        durationMs: 300,
      }),
    );

    const snapshot = metrics.snapshot();
    expect(snapshot.engagements).toEqual({
      attempted: 2,
      submitted: 1,
      failed: 1,
      failedByCode: { no_form_found: 1 },
      avgDurationMs: 200,
      errorRateInWindow: 0.5,
    });
    expect(snapshot.backends).toEqual({ static: 2, scripted: 1 });
  });

  test('tracks CAPTCHA solves and failures', () => {
    const metrics = new MetricsCollector();

    metrics.recordCaptchaSolved(20_000);
    metrics.recordCaptchaSolved(40_000);
    metrics.recordCaptchaFailed('timed_out');

    expect(metrics.snapshot().captcha).toEqual({ solved: 2, failed: 1, avgSolveLatencyMs: 30_000 });
  });

  test('emits to hooks and survives a broken one', () => {
    const metrics = new MetricsCollector();
    const seen: string[] = [];
    metrics.onEmit(() => {
      throw new Error('sink down');
    });
    metrics.onEmit((name) => seen.push(name));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    metrics.recordCaptchaFailed('solver_error');

    expect(seen).toEqual(['captcha.failed']);
    vi.restoreAllMocks();
  });

  test('reset clears everything', () => {
    const metrics = new MetricsCollector();
    metrics.recordOutcome(outcome('https://a.test/'));

    metrics.reset();

    expect(metrics.snapshot().engagements.attempted).toBe(0);
    expect(metrics.getErrorRateInWindow()).toBe(0);
  });
});
