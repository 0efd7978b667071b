import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { EngineConfigurationError, InvalidTargetError } from '../../engine/errors.js';
import { getLogger } from '../../monitoring/logger.js';

/**
 * Global error handler for the Hono app. Catches unhandled errors and
 * returns a consistent JSON error response.
 */
export function errorHandler(err: Error, c: Context) {
  if (err instanceof InvalidTargetError) {
    return c.json({ error: 'invalid_target', message: err.message }, 422);
  }

  getLogger().error('API error', { message: err.message, stack: err.stack });

  if (err instanceof HTTPException) {
    return c.json({ error: 'http_error', message: err.message }, err.status);
  }

  if (err instanceof EngineConfigurationError) {
    return c.json({ error: 'engine_misconfigured', message: err.message, setting: err.setting }, 503);
  }

  return c.json(
    {
      error: 'internal_error',
      message: 'An unexpected error occurred',
    },
    500,
  );
}
