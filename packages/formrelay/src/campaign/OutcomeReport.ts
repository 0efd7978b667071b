import { access, appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { SubmissionOutcome } from '../engine/types.js';

export const REPORT_COLUMNS = [
  'timestamp',
  'domain',
  'url',
  'submitted',
  'backend',
  'error_code',
  'error_message',
  'captcha',
  'signal',
  'duration_ms',
] as const;

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvLine(values: readonly string[]): string {
  return values.map(csvField).join(',');
}

export function outcomeRow(outcome: SubmissionOutcome): string[] {
  return [
    outcome.finishedAt,
    outcome.target.domain,
    outcome.target.url,
    String(outcome.submitted),
    outcome.backend,
    outcome.error?.code ?? '',
    outcome.error?.message ?? '',
    outcome.challenge ?? '',
    outcome.signal,
    String(outcome.durationMs),
  ];
}

/** Append-only CSV log of engagement outcomes, header written on first use. */
export class OutcomeReport {
  private appends: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  append(outcome: SubmissionOutcome): Promise<void> {
    const line = `${toCsvLine(outcomeRow(outcome))}\n`;
    const write = this.appends.then(async () => {
      let prefix = '';
      if (!(await this.exists())) {
        await mkdir(dirname(this.filePath), { recursive: true });
        prefix = `${toCsvLine(REPORT_COLUMNS)}\n`;
      }
      await appendFile(this.filePath, prefix + line, 'utf-8');
    });
    this.appends = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  private async exists(): Promise<boolean> {
    try {
      await access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }
}
