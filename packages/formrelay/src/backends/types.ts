import type { PageResult, HttpSession } from '../engine/HttpSession.js';
import type { BackendKind, BackendResult, OutreachMessage, SubmissionTarget } from '../engine/types.js';
import type { Logger } from '../monitoring/logger.js';

export interface SubmissionContext {
  target: SubmissionTarget;
  message: OutreachMessage;
  /** HTTP for this attempt: page fetches, static challenge images, form replay */
  session: HttpSession;
  /** Page already fetched by the engine, when it has one */
  page?: PageResult;
  signal?: AbortSignal;
  logger: Logger;
}

/**
 * One way of getting a filled form to the site. The engine picks the order;
 * a backend reports normal failures in its result and throws only for
 * cancellation or missing configuration.
 */
export interface SubmissionBackend {
  readonly kind: BackendKind;
  submit(context: SubmissionContext): Promise<BackendResult>;
}
