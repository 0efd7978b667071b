import type { CaptchaConfig } from '../../config/engine.js';
import type { CaptchaSolverProvider } from '../types.js';
import { AntiCaptchaProvider } from './AntiCaptchaProvider.js';
import { TwoCaptchaProvider } from './TwoCaptchaProvider.js';

export { AntiCaptchaProvider, type AntiCaptchaConfig } from './AntiCaptchaProvider.js';
export { TwoCaptchaProvider, type TwoCaptchaConfig } from './TwoCaptchaProvider.js';

/** Provider for the configured service, or null when no API key is set. */
export function createSolverProvider(config: CaptchaConfig): CaptchaSolverProvider | null {
  if (!config.apiKey) return null;
  switch (config.service) {
    case '2captcha':
      return new TwoCaptchaProvider({ apiKey: config.apiKey });
    case 'anticaptcha':
      return new AntiCaptchaProvider({ apiKey: config.apiKey });
  }
}
