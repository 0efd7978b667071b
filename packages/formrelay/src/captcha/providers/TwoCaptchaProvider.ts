/**
 * 2captcha client (legacy in.php / res.php API, JSON mode).
 *
 * @see https://2captcha.com/2captcha-api
 */

import { z } from 'zod';
import type { CaptchaSolverProvider, InteractiveJob, PollResult } from '../types.js';

export interface TwoCaptchaConfig {
  apiKey: string;
  /** Defaults to https://2captcha.com */
  baseUrl?: string;
}

const apiResponseSchema = z.object({
  status: z.number(),
  request: z.string(),
});

const NOT_READY = 'CAPCHA_NOT_READY';

const INTERACTIVE_METHODS = {
  recaptcha_v2: { method: 'userrecaptcha', keyParam: 'googlekey' },
  hcaptcha: { method: 'hcaptcha', keyParam: 'sitekey' },
} as const;

export class TwoCaptchaProvider implements CaptchaSolverProvider {
  readonly name = '2captcha';
  private baseUrl: string;
  private apiKey: string;

  constructor(config: TwoCaptchaConfig) {
    this.baseUrl = (config.baseUrl ?? 'https://2captcha.com').replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  /** POST /in.php method=base64 */
  async submitImageJob(image: Uint8Array, signal?: AbortSignal): Promise<string> {
    return this.submit({ method: 'base64', body: Buffer.from(image).toString('base64') }, signal);
  }

  /** POST /in.php method=userrecaptcha | hcaptcha */
  async submitInteractiveJob(job: InteractiveJob, signal?: AbortSignal): Promise<string> {
    const { method, keyParam } = INTERACTIVE_METHODS[job.kind];
    return this.submit({ method, [keyParam]: job.siteKey, pageurl: job.pageUrl }, signal);
  }

  /** GET /res.php?action=get */
  async pollJob(jobId: string, signal?: AbortSignal): Promise<PollResult> {
    const query = new URLSearchParams({ key: this.apiKey, action: 'get', id: jobId, json: '1' });
    const res = await this.request(`${this.baseUrl}/res.php?${query}`, { method: 'GET', signal });
    if (res.status === 1) return { status: 'ready', token: res.request };
    if (res.request === NOT_READY) return { status: 'pending' };
    return { status: 'failed', reason: res.request };
  }

  // --- Internal helpers ---

  private async submit(params: Record<string, string>, signal?: AbortSignal): Promise<string> {
    const body = new URLSearchParams({ key: this.apiKey, json: '1', ...params });
    const res = await this.request(`${this.baseUrl}/in.php`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
      signal,
    });

    if (res.status !== 1) {
      throw new Error(`2captcha submit failed (status=${res.status}): ${res.request}`);
    }
    return res.request;
  }

  private async request(url: string, init: RequestInit): Promise<z.infer<typeof apiResponseSchema>> {
    const response = await fetch(url, init);
    if (!response.ok) {
      throw new Error(`2captcha API HTTP error: ${response.status} ${response.statusText}`);
    }
    return apiResponseSchema.parse(await response.json());
  }
}
