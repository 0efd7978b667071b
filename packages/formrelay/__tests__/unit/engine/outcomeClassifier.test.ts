import { describe, expect, test } from 'vitest';
import { classifyOutcome } from '../../../src/engine/OutcomeClassifier.js';

describe('classifyOutcome', () => {
  test('an error phrase beats a success phrase', () => {
    const result = classifyOutcome({ status: 200, bodyText: 'Thank you! Error: email is invalid.' });

    expect(result).toEqual({ submitted: false, signal: 'error_phrase', matched: 'error' });
  });

  test('a success phrase submits', () => {
    const result = classifyOutcome({ status: 200, bodyText: 'Thank you for reaching out.' });

    expect(result).toEqual({ submitted: true, signal: 'success_phrase', matched: 'thank you' });
  });

  test('matching ignores case', () => {
    expect(classifyOutcome({ status: 200, bodyText: 'PLEASE TRY AGAIN' }).signal).toBe('error_phrase');
  });

  test('a success marker in the final URL submits', () => {
    const result = classifyOutcome({ status: 200, bodyText: 'Welcome', url: 'https://x.test/Thanks' });

    expect(result).toEqual({ submitted: true, signal: 'success_url', matched: 'thank' });
  });

  test('a bare 200 is optimistic and flagged as such', () => {
    const result = classifyOutcome({ status: 200, bodyText: 'Our bakery opens at 7am', url: 'https://x.test/' });

    expect(result).toEqual({ submitted: true, signal: 'optimistic_status' });
  });

  test('a bare 201 is optimistic too', () => {
    expect(classifyOutcome({ status: 201 }).signal).toBe('optimistic_status');
  });

  test('a bare redirect status has no signal', () => {
    expect(classifyOutcome({ status: 302, bodyText: 'Moved' })).toEqual({ submitted: false, signal: 'no_signal' });
  });

  test.each([400, 403, 404, 422, 500, 503, 204, 301])('status %i is rejected', (status) => {
    const result = classifyOutcome({ status, bodyText: 'Thank you' });

    expect(result).toEqual({ submitted: false, signal: 'status_rejected', matched: String(status) });
  });

  test('no evidence at all has no signal', () => {
    expect(classifyOutcome({})).toEqual({ submitted: false, signal: 'no_signal' });
  });
});
