// ── Challenges ────────────────────────────────────────────────────────

export type CaptchaKind = 'recaptcha_v2' | 'hcaptcha' | 'image' | 'unknown';

/** Challenge kinds solved by token (site key + page URL) rather than by image. */
export type InteractiveCaptchaKind = 'recaptcha_v2' | 'hcaptcha';

export interface NoChallenge {
  present: false;
}

export interface DetectedChallenge {
  present: true;
  kind: CaptchaKind;
  /** data-sitekey of a reCAPTCHA / hCaptcha widget */
  siteKey?: string;
  /** src of an image challenge, as written in the markup */
  imageSource?: string;
}

export type CaptchaChallenge = NoChallenge | DetectedChallenge;

export const NO_CHALLENGE: NoChallenge = { present: false };

// ── Solutions ─────────────────────────────────────────────────────────

export interface CaptchaSolution {
  kind: CaptchaKind;
  /** Response token (interactive) or recognized text (image) */
  token: string;
  latencyMs: number;
  provider: string;
}

export type CaptchaState =
  | 'no_challenge'
  | 'detected'
  | 'solving'
  | 'solved'
  | 'timed_out'
  | 'solver_error';

export type CaptchaResolution =
  | { state: 'solved'; solution: CaptchaSolution }
  | { state: 'timed_out'; polls: number; latencyMs: number }
  | { state: 'solver_error'; reason: string; latencyMs: number };

// ── Provider contract ─────────────────────────────────────────────────

export interface InteractiveJob {
  kind: InteractiveCaptchaKind;
  siteKey: string;
  pageUrl: string;
}

export type PollResult =
  | { status: 'ready'; token: string }
  | { status: 'pending' }
  | { status: 'failed'; reason: string };

/**
 * An external solving service. Every operation is one HTTP round trip;
 * the polling loop lives in CaptchaSolver.
 */
export interface CaptchaSolverProvider {
  readonly name: string;
  submitImageJob(image: Uint8Array, signal?: AbortSignal): Promise<string>;
  submitInteractiveJob(job: InteractiveJob, signal?: AbortSignal): Promise<string>;
  pollJob(jobId: string, signal?: AbortSignal): Promise<PollResult>;
}
