import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';
import { getEnv } from '../config/env.js';

// --- Types ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  requestId?: string;
  attemptId?: string;
  domain?: string;
  [key: string]: unknown;
}

/** Receives each serialized entry. Defaults to the console stream for the level. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  /** Fields added to every entry */
  bindings?: Record<string, unknown>;
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

function defaultLevel(): LogLevel {
  const env = getEnv();
  return env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
}

// --- Redaction ---
// Solver keys, session cookies and captcha tokens show up in request data;
// sender details show up in filled form values.

const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'api-key',
  'clientkey',
  'authorization',
  'cookie',
  'credential',
  'service_key',
  'servicekey',
  'x-service-key',
];

const INLINE_SECRETS = [
  /(?:sk|pk|key|token|secret|password)[_-]?[a-zA-Z0-9]{16,}/g,
  /(?:eyJ)[a-zA-Z0-9._-]{20,}/g, // JWTs
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // email addresses
  /\b\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}\b/g, // card numbers
];

const REDACTED = '[REDACTED]';

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redact(key: string, value: unknown): unknown {
  if (isRecord(value)) return redactObject(value);
  if (Array.isArray(value)) return value.map((item) => redact(key, item));
  if (typeof value !== 'string') return value;
  if (isSensitiveKey(key)) return REDACTED;
  return INLINE_SECRETS.reduce((text, pattern) => text.replace(pattern, REDACTED), value);
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = redact(key, value);
  }
  return result;
}

// --- Logger ---

/**
 * JSON-lines logger. Every entry carries the service name and the bindings of
 * the logger it came from; data is redacted before serialization.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly service: string;
  private readonly bindings: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? defaultLevel();
    this.service = opts.service ?? 'formrelay';
    this.bindings = opts.bindings ?? {};
    this.sink = opts.sink ?? consoleSink;
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      service: this.service,
      bindings: { ...this.bindings, ...bindings },
      sink: this.sink,
    });
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write('error', msg, data);
  }

  private write(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.bindings,
      ...(data ? redactObject(data) : {}),
    };
    this.sink(level, JSON.stringify(entry));
  }
}

let _defaultLogger: Logger | null = null;

export function getLogger(opts?: LoggerOptions): Logger {
  if (opts) return new Logger(opts);
  _defaultLogger ??= new Logger();
  return _defaultLogger;
}

// --- Hono request logging ---

export function requestLoggingMiddleware() {
  return async (c: Context, next: Next) => {
    const requestId = c.req.header('x-request-id') ?? randomUUID();
    const start = Date.now();
    const log = getLogger().child({ requestId });

    log.info('request_started', { method: c.req.method, path: c.req.path });
    c.header('X-Request-Id', requestId);

    await next();

    log.info('request_completed', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  };
}
