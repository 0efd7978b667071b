export * from './engine/index.js';
export * from './captcha/index.js';
export * from './backends/index.js';
export * from './campaign/index.js';
export * from './config/index.js';
export * from './monitoring/index.js';
export { RequestRateLimiter } from './security/index.js';
export { systemClock, type Clock } from './lib/clock.js';
export { createApp, startServer, type AppDependencies } from './api/index.js';
