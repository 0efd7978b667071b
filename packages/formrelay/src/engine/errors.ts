import type { CaptchaKind } from '../captcha/types.js';
import type { SubmissionError, SubmissionErrorCode } from './types.js';

/** Required configuration is missing or unusable. Thrown, never folded into an outcome. */
export class EngineConfigurationError extends Error {
  constructor(
    message: string,
    public readonly setting?: string,
  ) {
    super(message);
    this.name = 'EngineConfigurationError';
  }
}

/** The caller passed something that is not an absolute http(s) URL. */
export class InvalidTargetError extends Error {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
    this.name = 'InvalidTargetError';
  }
}

/**
 * A negative but normal result raised inside a backend run. The backend
 * catches it and reports `code` in the outcome instead of propagating.
 */
export class SubmissionFailure extends Error {
  constructor(
    public readonly code: SubmissionErrorCode,
    message: string,
    /** Challenge seen before the failure, when one was */
    public readonly challenge?: CaptchaKind,
  ) {
    super(message);
    this.name = 'SubmissionFailure';
  }

  toJSON(): SubmissionError {
    return { code: this.code, message: this.message };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
