import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { Engager } from '../campaign/CampaignRunner.js';
import { getEnv } from '../config/env.js';
import { createEngine } from '../engine/createEngine.js';
import { getLogger, requestLoggingMiddleware } from '../monitoring/logger.js';
import { getMetrics, type MetricsCollector } from '../monitoring/metrics.js';
import { authMiddleware } from './middleware/auth.js';
import { errorHandler } from './middleware/error-handler.js';
import { createEngagementRoutes } from './routes/engagements.js';
import { health } from './routes/health.js';
import { createMetricsRoutes } from './routes/metrics.js';

export interface AppDependencies {
  engine: Engager;
  metrics: MetricsCollector;
}

/**
 * Create and configure the Hono API application.
 * Designed to be imported by a server entry point or used in tests.
 */
export function createApp(deps: AppDependencies) {
  const app = new Hono();

  // ─── Global Middleware ─────────────────────────────────────────

  app.use('*', logger());
  app.use('*', requestLoggingMiddleware());

  // ─── Error Handler ─────────────────────────────────────────────

  app.onError(errorHandler);

  // ─── Health Check (no auth required) ───────────────────────────

  app.route('/health', health);

  // ─── Authenticated API Routes ──────────────────────────────────

  const api = new Hono();
  api.use('*', authMiddleware);
  api.route('/engagements', createEngagementRoutes(deps.engine));
  api.route('/metrics', createMetricsRoutes(deps.metrics));

  app.route('/api/v1', api);

  // ─── 404 Fallback ─────────────────────────────────────────────

  app.notFound((c) => {
    return c.json({ error: 'not_found', message: 'Route not found' }, 404);
  });

  return app;
}

export function startServer(port: number = getEnv().API_PORT) {
  const metrics = getMetrics();
  const app = createApp({ engine: createEngine(undefined, { metrics }), metrics });

  const server = serve({ fetch: app.fetch, port });
  getLogger().info('API listening', { url: `http://localhost:${port}` });
  return server;
}

// Auto-start when run directly
const isMainModule = process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js');

if (isMainModule) {
  startServer();
}
