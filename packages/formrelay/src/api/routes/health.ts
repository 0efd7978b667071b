import { Hono } from 'hono';
import { getEnv } from '../../config/env.js';

const startedAt = Date.now();

export const SERVICE_VERSION = '0.1.0';

const health = new Hono();

health.get('/', (c) => {
  return c.json({
    status: 'ok',
    service: 'formrelay',
    version: SERVICE_VERSION,
    environment: getEnv().NODE_ENV,
    uptime_ms: Date.now() - startedAt,
    timestamp: new Date().toISOString(),
  });
});

export { health };
