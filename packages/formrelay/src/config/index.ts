export { getEnv, parseEnv, resetEnv, type Env } from './env.js';
export { engineConfigFromEnv } from './engine.js';
export type {
  EngineConfig,
  CaptchaConfig,
  CaptchaServiceName,
  RateLimitConfig,
  SenderIdentity,
  TimeoutConfig,
} from './engine.js';
