import { describe, expect, test } from 'vitest';
import { engineConfigFromEnv } from '../../../src/config/engine.js';
import { parseEnv } from '../../../src/config/env.js';

describe('parseEnv', () => {
  test('applies defaults to an empty environment', () => {
    const env = parseEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      QPS_GLOBAL: 5,
      QPS_PER_DOMAIN: 2,
      FETCH_TIMEOUT_MS: 15_000,
      CAPTCHA_SERVICE: '2captcha',
      CAPTCHA_POLL_INTERVAL_MS: 10_000,
      CAPTCHA_IMAGE_MAX_POLLS: 30,
      CAPTCHA_INTERACTIVE_MAX_POLLS: 60,
      SCRIPTED_BACKEND_ENABLED: true,
      BROWSER_HEADLESS: true,
      MAX_CONCURRENT_ENGAGEMENTS: 3,
      API_PORT: 3100,
    });
    expect(env.CAPTCHA_API_KEY).toBeUndefined();
    expect(env.LOG_LEVEL).toBeUndefined();
  });

  test('coerces numbers and boolean flags', () => {
    const env = parseEnv({ QPS_PER_DOMAIN: '0.5', SCRIPTED_BACKEND_ENABLED: 'false', SETTLE_DELAY_MS: '0' });

    expect(env.QPS_PER_DOMAIN).toBe(0.5);
    expect(env.SCRIPTED_BACKEND_ENABLED).toBe(false);
    expect(env.SETTLE_DELAY_MS).toBe(0);
  });

  test('rejects unusable values', () => {
    expect(() => parseEnv({ QPS_GLOBAL: '0' })).toThrow();
    expect(() => parseEnv({ CAPTCHA_SERVICE: 'deathbycaptcha' })).toThrow();
    expect(() => parseEnv({ BROWSER_HEADLESS: 'yes' })).toThrow();
    expect(() => parseEnv({ SENDER_EMAIL: 'not-an-email' })).toThrow();
  });
});

describe('engineConfigFromEnv', () => {
  test('groups settings for the engine', () => {
    const config = engineConfigFromEnv(
      parseEnv({ CAPTCHA_SERVICE: 'anticaptcha', CAPTCHA_API_KEY: 'test-key', SENDER_NAME: 'Sam Lee' }),
    );

    expect(config.captcha).toEqual({
      service: 'anticaptcha',
      apiKey: 'test-key',
      pollIntervalMs: 10_000,
      imageMaxPolls: 30,
      interactiveMaxPolls: 60,
    });
    expect(config.rateLimits).toEqual({ globalQps: 5, perDomainQps: 2 });
    expect(config.timeouts).toEqual({ fetchMs: 15_000, submitMs: 15_000, navigationMs: 30_000, settleMs: 3_000 });
    expect(config.sender.name).toBe('Sam Lee');
    expect(config.scripted).toEqual({ enabled: true, headless: true });
  });
});
