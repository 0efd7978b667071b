import type { Context, Next } from 'hono';
import { getEnv } from '../../config/env.js';

export const SERVICE_KEY_HEADER = 'X-Service-Key';

/**
 * Service-to-service authentication: the X-Service-Key header must match
 * SERVICE_SECRET.
 */
export async function authMiddleware(c: Context, next: Next) {
  const expectedSecret = getEnv().SERVICE_SECRET;
  if (!expectedSecret) {
    return c.json({ error: 'server_config_error', message: 'Service secret not configured' }, 500);
  }

  const serviceKey = c.req.header(SERVICE_KEY_HEADER);
  if (!serviceKey) {
    return c.json({ error: 'unauthorized', message: 'Missing authentication credentials' }, 401);
  }
  if (serviceKey !== expectedSecret) {
    return c.json({ error: 'unauthorized', message: 'Invalid service key' }, 401);
  }

  await next();
}
