import type { ChallengeDetector } from '../captcha/ChallengeDetector.js';
import type { CaptchaSolver, ImageLoader } from '../captcha/CaptchaSolver.js';
import type { CaptchaChallenge } from '../captcha/types.js';
import type { DomDocument } from './dom/DomDocument.js';
import { SubmissionFailure } from './errors.js';
import type { FieldMapper } from './FieldMapper.js';
import type { FormLocator } from './FormLocator.js';
import type { FilledForm, FormCandidate, OutreachMessage } from './types.js';

export interface FormTools {
  locator: FormLocator;
  mapper: FieldMapper;
  detector: ChallengeDetector;
  solver: CaptchaSolver;
}

export interface PreparedForm {
  form: FormCandidate;
  filled: FilledForm;
  challenge: CaptchaChallenge;
}

/**
 * Locate, fill and (when guarded) unlock a form in `doc`. Both backends run
 * this against their own view of the page. Normal negatives are thrown as
 * SubmissionFailure for the backend to report.
 */
export async function prepareForm(
  doc: DomDocument,
  message: OutreachMessage,
  tools: FormTools,
  loadImage: ImageLoader,
  signal?: AbortSignal,
): Promise<PreparedForm> {
  const form = await tools.locator.locate(doc);
  if (!form) {
    throw new SubmissionFailure('no_form_found', `No contact form found on ${doc.url}`);
  }

  const filled = tools.mapper.map(form, message);
  const challenge = await tools.detector.detect(doc);
  if (!challenge.present) {
    return { form, filled, challenge };
  }

  const resolution = await tools.solver.resolve(challenge, doc.url, loadImage, signal);
  switch (resolution.state) {
    case 'solved':
      return {
        form,
        filled: tools.mapper.applyCaptcha(filled, form, challenge.kind, resolution.solution),
        challenge,
      };
    case 'timed_out':
      throw new SubmissionFailure(
        'captcha_timed_out',
        `${challenge.kind} not solved after ${resolution.polls} polls`,
        challenge.kind,
      );
    case 'solver_error':
      throw new SubmissionFailure('captcha_solver_error', resolution.reason, challenge.kind);
  }
}
