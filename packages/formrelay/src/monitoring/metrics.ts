import type { BackendKind, SubmissionErrorCode, SubmissionOutcome } from '../engine/types.js';
import { getLogger } from './logger.js';

// --- Types ---

export interface MetricSnapshot {
  engagements: EngagementMetrics;
  captcha: CaptchaMetrics;
  backends: Record<BackendKind, number>;
  uptime: number;
  collectedAt: string;
}

export interface EngagementMetrics {
  attempted: number;
  submitted: number;
  failed: number;
  failedByCode: Partial<Record<SubmissionErrorCode, number>>;
  avgDurationMs: number;
  /** Failures / attempts over the last five minutes */
  errorRateInWindow: number;
}

export interface CaptchaMetrics {
  solved: number;
  failed: number;
  avgSolveLatencyMs: number;
}

export type MetricHook = (name: string, value: number, tags?: Record<string, string>) => void;

// --- Internal counters ---

interface Counters {
  attempted: number;
  submitted: number;
  failed: number;
  failedByCode: Partial<Record<SubmissionErrorCode, number>>;
  durationsMs: number[];

  backendUsage: Record<BackendKind, number>;

  captchaSolved: number;
  captchaFailed: number;
  captchaLatenciesMs: number[];

  startedAt: number;
}

function freshCounters(): Counters {
  return {
    attempted: 0,
    submitted: 0,
    failed: 0,
    failedByCode: {},
    durationsMs: [],
    backendUsage: { static: 0, scripted: 0 },
    captchaSolved: 0,
    captchaFailed: 0,
    captchaLatenciesMs: [],
    startedAt: Date.now(),
  };
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.round(values.reduce((a, b) => a + b, 0) / values.length);
}

// --- Sliding window for rate calculations ---

const WINDOW_SIZE_MS = 5 * 60 * 1000; // 5 minutes

class SlidingWindow {
  private timestamps: number[] = [];

  add(): void {
    this.timestamps.push(Date.now());
    this.prune();
  }

  count(): number {
    this.prune();
    return this.timestamps.length;
  }

  clear(): void {
    this.timestamps = [];
  }

  private prune(): void {
    const cutoff = Date.now() - WINDOW_SIZE_MS;
    this.timestamps = this.timestamps.filter((t) => t >= cutoff);
  }
}

// --- Collector ---

export class MetricsCollector {
  private counters: Counters = freshCounters();
  private attemptWindow = new SlidingWindow();
  private errorWindow = new SlidingWindow();
  private hooks: MetricHook[] = [];

  recordOutcome(outcome: SubmissionOutcome): void {
    this.counters.attempted++;
    this.counters.durationsMs.push(outcome.durationMs);
    this.attemptWindow.add();

    for (const attempt of outcome.attempts) {
      this.counters.backendUsage[attempt.backend]++;
    }

    if (outcome.submitted) {
      this.counters.submitted++;
      this.emit('engagements.submitted', 1, { backend: outcome.backend });
    } else {
      this.counters.failed++;
      this.errorWindow.add();
      const code = outcome.error?.code;
      if (code) {
        this.counters.failedByCode[code] = (this.counters.failedByCode[code] ?? 0) + 1;
      }
      this.emit('engagements.failed', 1, { code: code ?? 'unknown' });
    }

    this.emit('engagements.duration_ms', outcome.durationMs);
  }

  recordCaptchaSolved(latencyMs: number): void {
    this.counters.captchaSolved++;
    this.counters.captchaLatenciesMs.push(latencyMs);
    this.emit('captcha.solved', 1);
    this.emit('captcha.latency_ms', latencyMs);
  }

  recordCaptchaFailed(reason: 'timed_out' | 'solver_error'): void {
    this.counters.captchaFailed++;
    this.emit('captcha.failed', 1, { reason });
  }

  snapshot(): MetricSnapshot {
    const c = this.counters;
    return {
      engagements: {
        attempted: c.attempted,
        submitted: c.submitted,
        failed: c.failed,
        failedByCode: { ...c.failedByCode },
        avgDurationMs: average(c.durationsMs),
        errorRateInWindow: this.getErrorRateInWindow(),
      },
      captcha: {
        solved: c.captchaSolved,
        failed: c.captchaFailed,
        avgSolveLatencyMs: average(c.captchaLatenciesMs),
      },
      backends: { ...c.backendUsage },
      uptime: Date.now() - c.startedAt,
      collectedAt: new Date().toISOString(),
    };
  }

  getErrorRateInWindow(): number {
    const attempts = this.attemptWindow.count();
    return attempts > 0 ? this.errorWindow.count() / attempts : 0;
  }

  onEmit(hook: MetricHook): void {
    this.hooks.push(hook);
  }

  private emit(name: string, value: number, tags?: Record<string, string>): void {
    for (const hook of this.hooks) {
      try {
        hook(name, value, tags);
      } catch (err) {
        // A broken hook must not fail the engagement that reported it
        getLogger().warn('metric_hook_failed', {
          metric: name,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  // --- Reset (for testing) ---

  reset(): void {
    this.counters = freshCounters();
    this.attemptWindow.clear();
    this.errorWindow.clear();
  }
}

// --- Singleton ---

let _metrics: MetricsCollector | null = null;

export function getMetrics(): MetricsCollector {
  if (!_metrics) {
    _metrics = new MetricsCollector();
  }
  return _metrics;
}
