/**
 * Engine configuration, resolved once from the environment at construction.
 *
 * The engine never re-reads configuration mid-run; callers that want different
 * settings build a new engine.
 */

import type { Env } from './env.js';

export type CaptchaServiceName = '2captcha' | 'anticaptcha';

export interface SenderIdentity {
  name: string;
  email: string;
  phone: string;
}

export interface RateLimitConfig {
  /** Global ceiling, requests per second */
  globalQps: number;
  /** Per-destination ceiling, requests per second */
  perDomainQps: number;
}

export interface CaptchaConfig {
  service: CaptchaServiceName;
  /** Absent means no solver is configured */
  apiKey?: string;
  pollIntervalMs: number;
  imageMaxPolls: number;
  interactiveMaxPolls: number;
}

export interface TimeoutConfig {
  fetchMs: number;
  submitMs: number;
  navigationMs: number;
  settleMs: number;
}

export interface EngineConfig {
  rateLimits: RateLimitConfig;
  timeouts: TimeoutConfig;
  captcha: CaptchaConfig;
  sender: SenderIdentity;
  scripted: {
    enabled: boolean;
    headless: boolean;
  };
}

export function engineConfigFromEnv(env: Env): EngineConfig {
  return {
    rateLimits: {
      globalQps: env.QPS_GLOBAL,
      perDomainQps: env.QPS_PER_DOMAIN,
    },
    timeouts: {
      fetchMs: env.FETCH_TIMEOUT_MS,
      submitMs: env.SUBMIT_TIMEOUT_MS,
      navigationMs: env.NAVIGATION_TIMEOUT_MS,
      settleMs: env.SETTLE_DELAY_MS,
    },
    captcha: {
      service: env.CAPTCHA_SERVICE,
      apiKey: env.CAPTCHA_API_KEY,
      pollIntervalMs: env.CAPTCHA_POLL_INTERVAL_MS,
      imageMaxPolls: env.CAPTCHA_IMAGE_MAX_POLLS,
      interactiveMaxPolls: env.CAPTCHA_INTERACTIVE_MAX_POLLS,
    },
    sender: {
      name: env.SENDER_NAME,
      email: env.SENDER_EMAIL,
      phone: env.SENDER_PHONE,
    },
    scripted: {
      enabled: env.SCRIPTED_BACKEND_ENABLED,
      headless: env.BROWSER_HEADLESS,
    },
  };
}
