import { InvalidTargetError } from '../engine/errors.js';
import type { EngageOptions } from '../engine/EngagementEngine.js';
import { createSubmissionTarget } from '../engine/target.js';
import type { OutreachMessage, SubmissionErrorCode, SubmissionOutcome } from '../engine/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { AttemptLedger } from './AttemptLedger.js';
import type { OutcomeReport } from './OutcomeReport.js';

export interface CampaignTarget {
  url: string;
  message: OutreachMessage;
}

export type SkipReason = 'already_attempted' | 'duplicate_domain' | 'invalid_url';

export interface SkippedTarget {
  url: string;
  reason: SkipReason;
}

export interface CampaignSummary {
  attempted: number;
  submitted: number;
  skipped: SkippedTarget[];
  failedByCode: Partial<Record<SubmissionErrorCode, number>>;
  outcomes: SubmissionOutcome[];
}

/** What the runner needs from an engine. */
export interface Engager {
  engage(url: string, message: OutreachMessage, opts?: EngageOptions): Promise<SubmissionOutcome>;
}

export interface CampaignRunnerOptions {
  engine: Engager;
  ledger: AttemptLedger;
  report?: OutcomeReport;
  concurrency: number;
  logger?: Logger;
}

/**
 * Runs one engagement per domain over a batch of targets with bounded
 * concurrency. Domains in the ledger, or repeated within the batch, are
 * skipped; every engaged domain is marked attempted whatever the outcome.
 */
export class CampaignRunner {
  private readonly log: Logger;

  constructor(private readonly opts: CampaignRunnerOptions) {
    if (opts.concurrency < 1) {
      throw new RangeError('Campaign concurrency must be at least 1');
    }
    this.log = (opts.logger ?? getLogger()).child({ component: 'campaign' });
  }

  async run(targets: CampaignTarget[], options: EngageOptions = {}): Promise<CampaignSummary> {
    const { queue, skipped } = this.plan(targets);
    const outcomes: SubmissionOutcome[] = [];

    this.log.info('Campaign started', { targets: targets.length, queued: queue.length, skipped: skipped.length });

    let next = 0;
    const worker = async () => {
      while (next < queue.length) {
        const target = queue[next++];
        outcomes.push(await this.engageOne(target, options));
      }
    };

    const workers = Array.from({ length: Math.min(this.opts.concurrency, queue.length) }, () => worker());
    await Promise.all(workers);

    const summary = summarize(outcomes, skipped);
    this.log.info('Campaign finished', {
      attempted: summary.attempted,
      submitted: summary.submitted,
      skipped: summary.skipped.length,
    });
    return summary;
  }

  private plan(targets: CampaignTarget[]): { queue: CampaignTarget[]; skipped: SkippedTarget[] } {
    const queue: CampaignTarget[] = [];
    const skipped: SkippedTarget[] = [];
    const seen = new Set<string>();

    for (const target of targets) {
      let domain: string;
      try {
        domain = createSubmissionTarget(target.url).domain;
      } catch (err) {
        if (!(err instanceof InvalidTargetError)) throw err;
        skipped.push({ url: target.url, reason: 'invalid_url' });
        continue;
      }

      if (this.opts.ledger.has(domain)) {
        skipped.push({ url: target.url, reason: 'already_attempted' });
      } else if (seen.has(domain)) {
        skipped.push({ url: target.url, reason: 'duplicate_domain' });
      } else {
        seen.add(domain);
        queue.push(target);
      }
    }
    return { queue, skipped };
  }

  private async engageOne(target: CampaignTarget, options: EngageOptions): Promise<SubmissionOutcome> {
    const outcome = await this.opts.engine.engage(target.url, target.message, options);
    await this.opts.ledger.mark(outcome.target.domain);
    await this.opts.report?.append(outcome);
    return outcome;
  }
}

function summarize(outcomes: SubmissionOutcome[], skipped: SkippedTarget[]): CampaignSummary {
  const failedByCode: Partial<Record<SubmissionErrorCode, number>> = {};
  let submitted = 0;

  for (const outcome of outcomes) {
    if (outcome.submitted) {
      submitted++;
    } else if (outcome.error) {
      failedByCode[outcome.error.code] = (failedByCode[outcome.error.code] ?? 0) + 1;
    }
  }

  return { attempted: outcomes.length, submitted, skipped, failedByCode, outcomes };
}
