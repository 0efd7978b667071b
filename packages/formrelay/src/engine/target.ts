import { InvalidTargetError } from './errors.js';
import type { SubmissionTarget } from './types.js';

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/** Lower-cased host without a leading "www." */
export function domainOf(url: string): string {
  return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
}

export function createSubmissionTarget(input: string): SubmissionTarget {
  const trimmed = input.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new InvalidTargetError(`Target is not an absolute URL: ${input}`, input);
  }
  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    throw new InvalidTargetError(`Target must use http or https: ${input}`, input);
  }
  return Object.freeze({ url: parsed.href, domain: domainOf(parsed.href) });
}
