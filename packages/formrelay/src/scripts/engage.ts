/**
 * Run one engagement attempt and print the outcome.
 *
 * Usage:
 *   npx tsx --env-file=.env src/scripts/engage.ts --url=<page> --subject="..." --body="..."
 */

import { createEngine } from '../engine/createEngine.js';
import { getMetrics } from '../monitoring/metrics.js';
import { abortOnInterrupt, parseArg } from './args.js';

async function main() {
  const url = parseArg('url');
  const subject = parseArg('subject');
  const body = parseArg('body');
  if (!url || !subject || !body) {
    console.error('Error: --url, --subject and --body are required.');
    console.error('Example: npx tsx src/scripts/engage.ts --url=https://example.com/contact --subject="Hello" --body="..."');
    process.exit(1);
  }

  const controller = abortOnInterrupt();
  const engine = createEngine(undefined, { metrics: getMetrics() });
  const outcome = await engine.engage(url, { subject, body }, { signal: controller.signal });

  console.log(JSON.stringify(outcome, null, 2));
  process.exit(outcome.submitted ? 0 : 2);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
