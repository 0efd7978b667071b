import { EngineConfigurationError, SubmissionFailure, errorMessage } from '../engine/errors.js';
import type { Classification } from '../engine/OutcomeClassifier.js';
import type { BackendKind, BackendResult, SubmissionErrorCode } from '../engine/types.js';
import type { CaptchaKind } from '../captcha/types.js';

export function failedResult(
  backend: BackendKind,
  code: SubmissionErrorCode,
  message: string,
  challenge?: CaptchaKind,
): BackendResult {
  return { backend, submitted: false, error: { code, message }, signal: 'none', challenge };
}

export function classifiedResult(
  backend: BackendKind,
  classification: Classification,
  status: number | undefined,
  challenge?: CaptchaKind,
): BackendResult {
  if (classification.submitted) {
    return { backend, submitted: true, signal: classification.signal, status, challenge };
  }
  const detail = classification.matched ? ` (${classification.matched})` : '';
  return {
    backend,
    submitted: false,
    signal: classification.signal,
    status,
    challenge,
    error: {
      code: 'submission_rejected',
      message: `Site did not confirm the submission: ${classification.signal}${detail}`,
    },
  };
}

/**
 * Fold an error raised inside a backend run into its result. Cancellation and
 * configuration errors are rethrown; anything unexpected counts as a rejected
 * submission.
 */
export function resultFromError(
  backend: BackendKind,
  err: unknown,
  signal: AbortSignal | undefined,
  challenge?: CaptchaKind,
): BackendResult {
  if (signal?.aborted || err instanceof EngineConfigurationError) throw err;
  if (err instanceof SubmissionFailure) {
    return failedResult(backend, err.code, err.message, err.challenge ?? challenge);
  }
  const message = `Unexpected ${backend} backend error: ${errorMessage(err)}`;
  return failedResult(backend, 'submission_rejected', message, challenge);
}
