import { Hono } from 'hono';
import type { MetricsCollector } from '../../monitoring/metrics.js';

export function createMetricsRoutes(metrics: MetricsCollector) {
  const app = new Hono();

  app.get('/', (c) => c.json(metrics.snapshot()));

  return app;
}
