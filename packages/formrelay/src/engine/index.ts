export { EngagementEngine } from './EngagementEngine.js';
export type { EngagementEngineOptions, EngageOptions } from './EngagementEngine.js';
export { createEngine, type CreateEngineOverrides } from './createEngine.js';
export { FormLocator, describeField, resolveAction, CONTACT_KEYWORDS } from './FormLocator.js';
export { FieldMapper, classifyField, captchaFieldNames, ROLE_KEYWORDS } from './FieldMapper.js';
export { classifyOutcome, ACCEPTED_STATUSES, ERROR_PHRASES, SUCCESS_PHRASES } from './OutcomeClassifier.js';
export type { Classification, ResponseEvidence } from './OutcomeClassifier.js';
export { prepareForm, type FormTools, type PreparedForm } from './FormPreparation.js';
export { HttpSession, BROWSER_HEADERS, type PageResult, type HttpResponse } from './HttpSession.js';
export { createSubmissionTarget, domainOf } from './target.js';
export { EngineConfigurationError, InvalidTargetError, SubmissionFailure } from './errors.js';
export { CheerioDocument, htmlToText } from './dom/CheerioDocument.js';
export { PlaywrightDocument, PlaywrightElement, type LivePage } from './dom/PlaywrightDocument.js';
export type { DomDocument, DomElement } from './dom/DomDocument.js';
export type {
  BackendAttempt,
  BackendKind,
  BackendResult,
  FieldAssignment,
  FieldDescriptor,
  FieldKind,
  FieldRole,
  FilledForm,
  FormCandidate,
  FormMethod,
  OutcomeSignal,
  OutreachMessage,
  SubmissionError,
  SubmissionErrorCode,
  SubmissionOutcome,
  SubmissionTarget,
} from './types.js';
