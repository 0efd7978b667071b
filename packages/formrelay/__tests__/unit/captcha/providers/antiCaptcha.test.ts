import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { AntiCaptchaProvider } from '../../../../src/captcha/providers/AntiCaptchaProvider.js';
import { createSolverProvider } from '../../../../src/captcha/providers/index.js';
import { TwoCaptchaProvider } from '../../../../src/captcha/providers/TwoCaptchaProvider.js';
import { fetchCall, jsonResponse } from '../../../fixtures/http.js';

function jsonBody(init: RequestInit): unknown {
  return JSON.parse(String(init.body));
}

describe('AntiCaptchaProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let provider: AntiCaptchaProvider;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    provider = new AntiCaptchaProvider({ apiKey: 'test-key', baseUrl: 'https://anti.test' });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test('creates an image task', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ errorId: 0, taskId: 4512 }));

    const jobId = await provider.submitImageJob(new Uint8Array([104, 105]));

    expect(jobId).toBe('4512');
    const { url, init } = fetchCall(fetchMock, 0);
    expect(url).toBe('https://anti.test/createTask');
    expect(jsonBody(init)).toEqual({ clientKey: 'test-key', task: { type: 'ImageToTextTask', body: 'aGk=' } });
  });

  test('creates token tasks per widget kind', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ errorId: 0, taskId: 1 }))
      .mockResolvedValueOnce(jsonResponse({ errorId: 0, taskId: 2 }));

    await provider.submitInteractiveJob({ kind: 'recaptcha_v2', siteKey: 'rk', pageUrl: 'https://shop.test/' });
    await provider.submitInteractiveJob({ kind: 'hcaptcha', siteKey: 'hk', pageUrl: 'https://shop.test/' });

    expect(jsonBody(fetchCall(fetchMock, 0).init)).toEqual({
      clientKey: 'test-key',
      task: { type: 'RecaptchaV2TaskProxyless', websiteURL: 'https://shop.test/', websiteKey: 'rk' },
    });
    expect(jsonBody(fetchCall(fetchMock, 1).init)).toEqual({
      clientKey: 'test-key',
      task: { type: 'HCaptchaTaskProxyless', websiteURL: 'https://shop.test/', websiteKey: 'hk' },
    });
  });

  test('a createTask error throws with the error code', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ errorId: 1, errorCode: 'ERROR_KEY_DOES_NOT_EXIST' }));

    await expect(provider.submitImageJob(new Uint8Array([1]))).rejects.toThrow(
      'Anti-Captcha createTask failed (errorId=1): ERROR_KEY_DOES_NOT_EXIST',
    );
  });

  test('polls with a numeric task id and maps results', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ errorId: 0, status: 'processing' }))
      .mockResolvedValueOnce(jsonResponse({ errorId: 0, status: 'ready', solution: { gRecaptchaResponse: 'g-tok' } }))
      .mockResolvedValueOnce(jsonResponse({ errorId: 0, status: 'ready', solution: { text: 'x7k2' } }))
      .mockResolvedValueOnce(jsonResponse({ errorId: 12, errorCode: 'ERROR_CAPTCHA_UNSOLVABLE' }));

    expect(await provider.pollJob('4512')).toEqual({ status: 'pending' });
    expect(await provider.pollJob('4512')).toEqual({ status: 'ready', token: 'g-tok' });
    expect(await provider.pollJob('4512')).toEqual({ status: 'ready', token: 'x7k2' });
    expect(await provider.pollJob('4512')).toEqual({ status: 'failed', reason: 'ERROR_CAPTCHA_UNSOLVABLE' });

    expect(jsonBody(fetchCall(fetchMock, 0).init)).toEqual({ clientKey: 'test-key', taskId: 4512 });
  });

  test('ready without a solution fails', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ errorId: 0, status: 'ready' }));

    expect(await provider.pollJob('1')).toEqual({ status: 'failed', reason: 'ready without a solution' });
  });
});

describe('createSolverProvider', () => {
  const polling = { pollIntervalMs: 1, imageMaxPolls: 1, interactiveMaxPolls: 1 };

  test('returns null without an API key', () => {
    expect(createSolverProvider({ service: '2captcha', ...polling })).toBeNull();
  });

  test('builds the configured service', () => {
    expect(createSolverProvider({ service: '2captcha', apiKey: 'test-key', ...polling })).toBeInstanceOf(
      TwoCaptchaProvider,
    );
    expect(createSolverProvider({ service: 'anticaptcha', apiKey: 'test-key', ...polling })).toBeInstanceOf(
      AntiCaptchaProvider,
    );
  });
});
