export { ChallengeDetector } from './ChallengeDetector.js';
export { CaptchaSolver } from './CaptchaSolver.js';
export type { CaptchaSolverOptions, ImageLoader, PollingConfig } from './CaptchaSolver.js';
export { createSolverProvider, TwoCaptchaProvider, AntiCaptchaProvider } from './providers/index.js';
export type { TwoCaptchaConfig, AntiCaptchaConfig } from './providers/index.js';
export { NO_CHALLENGE } from './types.js';
export type {
  CaptchaChallenge,
  CaptchaKind,
  CaptchaResolution,
  CaptchaSolution,
  CaptchaSolverProvider,
  CaptchaState,
  DetectedChallenge,
  InteractiveCaptchaKind,
  InteractiveJob,
  NoChallenge,
  PollResult,
} from './types.js';
