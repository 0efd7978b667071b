export { authMiddleware, SERVICE_KEY_HEADER } from './auth.js';
export { errorHandler } from './error-handler.js';
export { validateBody, type ValidatedBodyEnv } from './validation.js';
