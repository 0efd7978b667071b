import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  // Outbound request pacing (requests per second)
  QPS_GLOBAL: z.coerce.number().positive().default(5),
  QPS_PER_DOMAIN: z.coerce.number().positive().default(2),

  // Per-request timeouts
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  SUBMIT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SETTLE_DELAY_MS: z.coerce.number().int().min(0).default(3_000),

  // CAPTCHA solving
  CAPTCHA_SERVICE: z.enum(['2captcha', 'anticaptcha']).default('2captcha'),
  CAPTCHA_API_KEY: z.string().min(1).optional(),
  CAPTCHA_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  CAPTCHA_IMAGE_MAX_POLLS: z.coerce.number().int().positive().default(30),
  CAPTCHA_INTERACTIVE_MAX_POLLS: z.coerce.number().int().positive().default(60),

  // Scripted (browser) backend
  SCRIPTED_BACKEND_ENABLED: booleanFlag,
  BROWSER_HEADLESS: booleanFlag,

  // Identity written into name/email/phone fields
  SENDER_NAME: z.string().min(1).default('Alex Morgan'),
  SENDER_EMAIL: z.string().email().default('alex.morgan@example.com'),
  SENDER_PHONE: z.string().min(1).default('555-010-0199'),

  // Campaign layer
  DATA_DIR: z.string().min(1).default('data'),
  MAX_CONCURRENT_ENGAGEMENTS: z.coerce.number().int().positive().default(3),

  // HTTP API
  API_PORT: z.coerce.number().int().positive().default(3100),
  SERVICE_SECRET: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Parse an explicit source instead of process.env (scripts, tests). */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/** Drop the cached env so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}
