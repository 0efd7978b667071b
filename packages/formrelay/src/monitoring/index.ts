export { Logger, getLogger, redactObject, requestLoggingMiddleware } from './logger.js';
export type { LogLevel, LogEntry, LoggerOptions, LogSink } from './logger.js';

export { MetricsCollector, getMetrics } from './metrics.js';
export type { MetricSnapshot, EngagementMetrics, CaptchaMetrics, MetricHook } from './metrics.js';
