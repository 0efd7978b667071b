import type { OutcomeSignal } from './types.js';

export const ACCEPTED_STATUSES: ReadonlySet<number> = new Set([200, 201, 302, 303]);

export const ERROR_PHRASES = [
  'error',
  'failed',
  'invalid',
  'required',
  'missing',
  'incorrect',
  'try again',
] as const;

export const SUCCESS_PHRASES = [
  'thank you',
  'success',
  'submitted',
  'received',
  'sent',
  'confirmation',
  'message sent',
] as const;

const SUCCESS_URL_MARKERS = ['thank', 'success'] as const;

export interface ResponseEvidence {
  status?: number;
  /** Visible text of the response page */
  bodyText?: string;
  /** Final URL after redirects */
  url?: string;
}

export interface Classification {
  submitted: boolean;
  signal: OutcomeSignal;
  /** The phrase or marker that decided, when one did */
  matched?: string;
}

/**
 * Decide whether a submission went through from what came back.
 *
 * Rules, first match wins:
 *  1. a status outside 200/201/302/303 fails
 *  2. an error phrase in the body fails, even next to a success phrase
 *  3. a success phrase in the body, or "thank"/"success" in the final URL, succeeds
 *  4. a bare 200/201 succeeds (optimistic; forms that silently no-op pass here)
 *  5. anything else fails with no signal
 *
 * Matching is case-insensitive substring matching.
 */
export function classifyOutcome(evidence: ResponseEvidence): Classification {
  const { status } = evidence;
  if (status !== undefined && !ACCEPTED_STATUSES.has(status)) {
    return { submitted: false, signal: 'status_rejected', matched: String(status) };
  }

  const body = (evidence.bodyText ?? '').toLowerCase();

  const errorPhrase = ERROR_PHRASES.find((phrase) => body.includes(phrase));
  if (errorPhrase) {
    return { submitted: false, signal: 'error_phrase', matched: errorPhrase };
  }

  const successPhrase = SUCCESS_PHRASES.find((phrase) => body.includes(phrase));
  if (successPhrase) {
    return { submitted: true, signal: 'success_phrase', matched: successPhrase };
  }

  const url = (evidence.url ?? '').toLowerCase();
  const urlMarker = SUCCESS_URL_MARKERS.find((marker) => url.includes(marker));
  if (urlMarker) {
    return { submitted: true, signal: 'success_url', matched: urlMarker };
  }

  if (status === 200 || status === 201) {
    return { submitted: true, signal: 'optimistic_status' };
  }

  return { submitted: false, signal: 'no_signal' };
}
