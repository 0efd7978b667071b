import type { CaptchaKind } from '../captcha/types.js';

// ── Inputs ────────────────────────────────────────────────────────────

export interface SubmissionTarget {
  readonly url: string;
  /** Lower-cased host without a leading "www." */
  readonly domain: string;
}

export interface OutreachMessage {
  subject: string;
  body: string;
}

// ── Forms ─────────────────────────────────────────────────────────────

export type FieldKind =
  | 'text'
  | 'email'
  | 'tel'
  | 'hidden'
  | 'checkbox'
  | 'radio'
  | 'select'
  | 'textarea';

export interface FieldDescriptor {
  name: string;
  id?: string;
  kind: FieldKind;
  visible: boolean;
  disabled: boolean;
  placeholder?: string;
  label?: string;
  /** Default value from the markup */
  value?: string;
  checked: boolean;
  /** Selects only: value (or text) of the first option */
  firstOptionValue?: string;
}

export type FormMethod = 'GET' | 'POST';

export interface FormCandidate {
  /** Absolute submission URL */
  action: string;
  method: FormMethod;
  fields: FieldDescriptor[];
  /** Position among the page's forms; -1 for an implicit form */
  index: number;
  /** True when the page has no <form> but shows contact-form signals */
  implicit: boolean;
}

export type FieldRole = 'name' | 'email' | 'phone' | 'subject' | 'message' | 'unknown';

export interface FieldAssignment {
  field: FieldDescriptor;
  role: FieldRole;
  value: string;
}

export interface FilledForm {
  values: Map<string, string>;
  assignments: FieldAssignment[];
}

// ── Outcomes ──────────────────────────────────────────────────────────

export type BackendKind = 'static' | 'scripted';

export type SubmissionErrorCode =
  | 'fetch_failed'
  | 'no_form_found'
  | 'captcha_timed_out'
  | 'captcha_solver_error'
  | 'submission_rejected'
  | 'backend_unavailable';

export interface SubmissionError {
  code: SubmissionErrorCode;
  message: string;
}

/** Which rule of the classifier decided the outcome. */
export type OutcomeSignal =
  | 'status_rejected'
  | 'error_phrase'
  | 'success_phrase'
  | 'success_url'
  | 'optimistic_status'
  | 'no_signal'
  | 'none';

export interface BackendAttempt {
  backend: BackendKind;
  submitted: boolean;
  error?: SubmissionError;
  durationMs: number;
}

export interface SubmissionOutcome {
  submitted: boolean;
  /** Backend of the final attempt */
  backend: BackendKind;
  target: SubmissionTarget;
  challenge?: CaptchaKind;
  error?: SubmissionError;
  signal: OutcomeSignal;
  /** HTTP status of the submission response, when one was received */
  status?: number;
  attempts: BackendAttempt[];
  durationMs: number;
  finishedAt: string;
}

/** Result of a single backend run, before the engine folds attempts together. */
export interface BackendResult {
  backend: BackendKind;
  submitted: boolean;
  challenge?: CaptchaKind;
  error?: SubmissionError;
  signal: OutcomeSignal;
  status?: number;
}
