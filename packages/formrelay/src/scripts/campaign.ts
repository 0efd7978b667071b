/**
 * Run a campaign over a JSON file of targets, one engagement per domain.
 *
 * The file holds an array of { url, subject, body }. Attempted domains are
 * kept in $DATA_DIR/attempted-domains.json and every outcome is appended to
 * $DATA_DIR/engagement-log.csv.
 *
 * Usage:
 *   npx tsx --env-file=.env src/scripts/campaign.ts --targets=targets.json
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { AttemptLedger } from '../campaign/AttemptLedger.js';
import { CampaignRunner } from '../campaign/CampaignRunner.js';
import { OutcomeReport } from '../campaign/OutcomeReport.js';
import { getEnv } from '../config/env.js';
import { createEngine } from '../engine/createEngine.js';
import { getMetrics } from '../monitoring/metrics.js';
import { abortOnInterrupt, parseArg } from './args.js';

const targetsFileSchema = z.array(
  z.object({
    url: z.string().min(1),
    subject: z.string().min(1),
    body: z.string().min(1),
  }),
);

async function main() {
  const targetsPath = parseArg('targets');
  if (!targetsPath) {
    console.error('Error: --targets=<file.json> is required.');
    process.exit(1);
  }

  const env = getEnv();
  const targets = targetsFileSchema
    .parse(JSON.parse(await readFile(targetsPath, 'utf-8')))
    .map(({ url, subject, body }) => ({ url, message: { subject, body } }));

  const metrics = getMetrics();
  const runner = new CampaignRunner({
    engine: createEngine(undefined, { metrics }),
    ledger: await AttemptLedger.load(join(env.DATA_DIR, 'attempted-domains.json')),
    report: new OutcomeReport(join(env.DATA_DIR, 'engagement-log.csv')),
    concurrency: env.MAX_CONCURRENT_ENGAGEMENTS,
  });

  const controller = abortOnInterrupt();
  const summary = await runner.run(targets, { signal: controller.signal });

  console.log('Campaign finished\n');
  console.log(`   Attempted:  ${summary.attempted}`);
  console.log(`   Submitted:  ${summary.submitted}`);
  console.log(`   Skipped:    ${summary.skipped.length}`);
  for (const [code, count] of Object.entries(summary.failedByCode)) {
    console.log(`   ${code}: ${count}`);
  }
  console.log(`\n   Metrics:    ${JSON.stringify(metrics.snapshot().engagements)}`);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
