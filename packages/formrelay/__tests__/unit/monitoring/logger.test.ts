import { afterEach, describe, expect, test, vi } from 'vitest';
import { Logger, redactObject } from '../../../src/monitoring/logger.js';

describe('redactObject', () => {
  test('redacts sensitive keys, nested and in arrays', () => {
    expect(
      redactObject({
        clientKey: 'abc',
        nested: { apiKey: 'def', count: 3 },
        headers: [{ cookie: 'sid=1' }],
        url: 'https://shop.test/contact',
      }),
    ).toEqual({
      clientKey: '[REDACTED]',
      nested: { apiKey: '[REDACTED]', count: 3 },
      headers: [{ cookie: '[REDACTED]' }],
      url: 'https://shop.test/contact',
    });
  });

  test('redacts email addresses inside values', () => {
    expect(redactObject({ reason: 'rejected sender@example.test today' })).toEqual({
      reason: 'rejected [REDACTED] today',
    });
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('writes JSON lines with the child context', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const log = new Logger({ level: 'info', service: 'test' }).child({ domain: 'shop.test' });

    log.info('Engagement started', { order: ['static'] });

    expect(out).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(out.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'info',
      msg: 'Engagement started',
      service: 'test',
      domain: 'shop.test',
      order: ['static'],
    });
  });

  test('children share the parent sink and merge bindings', () => {
    const lines: string[] = [];
    const root = new Logger({ level: 'debug', sink: (_level, line) => lines.push(line) });

    root.child({ attemptId: 'a1' }).child({ backend: 'static' }).debug('Replaying form', { clientKey: 'test-secret' });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'debug',
      service: 'formrelay',
      attemptId: 'a1',
      backend: 'static',
      clientKey: '[REDACTED]',
    });
  });

  test('drops entries below its level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = new Logger({ level: 'warn' });

    log.debug('noise');
    log.warn('kept');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
