import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

const ledgerFileSchema = z.object({
  domains: z.array(z.string()),
  updatedAt: z.string().optional(),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Domains already engaged, persisted as JSON. A domain is marked whatever
 * the outcome, so a campaign never contacts the same business twice.
 */
export class AttemptLedger {
  private readonly domains: Set<string>;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    domains: Iterable<string> = [],
  ) {
    this.domains = new Set([...domains].map((d) => d.toLowerCase()));
  }

  /** Load from disk; a missing file is an empty ledger. */
  static async load(filePath: string): Promise<AttemptLedger> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return new AttemptLedger(filePath);
      throw err;
    }
    const parsed = ledgerFileSchema.parse(JSON.parse(raw));
    return new AttemptLedger(filePath, parsed.domains);
  }

  has(domain: string): boolean {
    return this.domains.has(domain.toLowerCase());
  }

  get size(): number {
    return this.domains.size;
  }

  list(): string[] {
    return [...this.domains].sort();
  }

  /** Mark and persist. Writes are applied in call order. */
  mark(domain: string): Promise<void> {
    this.domains.add(domain.toLowerCase());
    return this.save();
  }

  save(): Promise<void> {
    const snapshot = JSON.stringify({ domains: this.list(), updatedAt: new Date().toISOString() }, null, 2);
    const write = this.writes.then(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, `${snapshot}\n`, 'utf-8');
    });
    // Keep the chain usable after a failed write; the caller still sees the failure
    this.writes = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }
}
