export { AttemptLedger } from './AttemptLedger.js';
export { OutcomeReport, REPORT_COLUMNS, outcomeRow, toCsvLine } from './OutcomeReport.js';
export { CampaignRunner } from './CampaignRunner.js';
export type {
  CampaignRunnerOptions,
  CampaignSummary,
  CampaignTarget,
  Engager,
  SkipReason,
  SkippedTarget,
} from './CampaignRunner.js';
