/**
 * Anti-Captcha client (createTask / getTaskResult JSON API).
 *
 * @see https://anti-captcha.com/apidoc
 */

import { z } from 'zod';
import type { CaptchaSolverProvider, InteractiveJob, PollResult } from '../types.js';

export interface AntiCaptchaConfig {
  apiKey: string;
  /** Defaults to https://api.anti-captcha.com */
  baseUrl?: string;
}

const createTaskSchema = z.object({
  errorId: z.number(),
  errorCode: z.string().optional(),
  errorDescription: z.string().optional(),
  taskId: z.union([z.number(), z.string()]).optional(),
});

const taskResultSchema = z.object({
  errorId: z.number(),
  errorCode: z.string().optional(),
  errorDescription: z.string().optional(),
  status: z.string().optional(),
  solution: z
    .object({
      text: z.string().optional(),
      gRecaptchaResponse: z.string().optional(),
    })
    .optional(),
});

const INTERACTIVE_TASK_TYPES = {
  recaptcha_v2: 'RecaptchaV2TaskProxyless',
  hcaptcha: 'HCaptchaTaskProxyless',
} as const;

export class AntiCaptchaProvider implements CaptchaSolverProvider {
  readonly name = 'anticaptcha';
  private baseUrl: string;
  private apiKey: string;

  constructor(config: AntiCaptchaConfig) {
    this.baseUrl = (config.baseUrl ?? 'https://api.anti-captcha.com').replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  /** POST /createTask ImageToTextTask */
  async submitImageJob(image: Uint8Array, signal?: AbortSignal): Promise<string> {
    return this.createTask({ type: 'ImageToTextTask', body: Buffer.from(image).toString('base64') }, signal);
  }

  /** POST /createTask RecaptchaV2TaskProxyless | HCaptchaTaskProxyless */
  async submitInteractiveJob(job: InteractiveJob, signal?: AbortSignal): Promise<string> {
    return this.createTask(
      { type: INTERACTIVE_TASK_TYPES[job.kind], websiteURL: job.pageUrl, websiteKey: job.siteKey },
      signal,
    );
  }

  /** POST /getTaskResult */
  async pollJob(jobId: string, signal?: AbortSignal): Promise<PollResult> {
    // Task ids are numeric; the API rejects them as strings
    const taskId = /^\d+$/.test(jobId) ? Number(jobId) : jobId;
    const res = taskResultSchema.parse(await this.post('/getTaskResult', { clientKey: this.apiKey, taskId }, signal));

    if (res.errorId !== 0) {
      return { status: 'failed', reason: res.errorCode ?? res.errorDescription ?? `errorId=${res.errorId}` };
    }
    if (res.status === 'processing') return { status: 'pending' };
    if (res.status === 'ready') {
      const token = res.solution?.gRecaptchaResponse ?? res.solution?.text;
      if (token) return { status: 'ready', token };
      return { status: 'failed', reason: 'ready without a solution' };
    }
    return { status: 'failed', reason: `unexpected status: ${res.status ?? 'none'}` };
  }

  // --- Internal helpers ---

  private async createTask(task: Record<string, string>, signal?: AbortSignal): Promise<string> {
    const res = createTaskSchema.parse(await this.post('/createTask', { clientKey: this.apiKey, task }, signal));

    if (res.errorId !== 0 || res.taskId === undefined) {
      throw new Error(
        `Anti-Captcha createTask failed (errorId=${res.errorId}): ${res.errorCode ?? res.errorDescription ?? 'no taskId'}`,
      );
    }
    return String(res.taskId);
  }

  private async post(path: string, payload: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Anti-Captcha API HTTP error: ${response.status} ${response.statusText}`);
    }
    return response.json();
  }
}
