export { RequestRateLimiter } from './rateLimit.js';
