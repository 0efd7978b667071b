import type { Locator, Response } from 'playwright';
import type { ImageLoader } from '../captcha/CaptchaSolver.js';
import type { TimeoutConfig } from '../config/engine.js';
import { PlaywrightDocument } from '../engine/dom/PlaywrightDocument.js';
import { cssAttrValue } from '../engine/dom/DomDocument.js';
import { SubmissionFailure, errorMessage } from '../engine/errors.js';
import { captchaFieldNames } from '../engine/FieldMapper.js';
import { prepareForm, type FormTools, type PreparedForm } from '../engine/FormPreparation.js';
import { classifyOutcome } from '../engine/OutcomeClassifier.js';
import type { BackendResult, FormCandidate } from '../engine/types.js';
import type { Logger } from '../monitoring/logger.js';
import type { RequestRateLimiter } from '../security/rateLimit.js';
import {
  withBrowserSession,
  type BrowserSession,
  type BrowserSessionFactory,
  type ScriptedPage,
} from './BrowserSession.js';
import { classifiedResult, failedResult, resultFromError } from './results.js';
import type { SubmissionBackend, SubmissionContext } from './types.js';

/** Tried in order; the first visible match is clicked. */
export const SUBMIT_SELECTORS = [
  'input[type="submit"]',
  'button[type="submit"]',
  'button:has-text("Send")',
  'button:has-text("Submit")',
  'button:has-text("Contact")',
  'input[value*="Send" i]',
  'input[value*="Submit" i]',
] as const;

const TYPED_KINDS = new Set(['text', 'email', 'tel', 'textarea']);

/**
 * Drives a real browser: navigate, let scripts render, find the form in the
 * live DOM, type into it like a user and click submit. Slower than the static
 * backend but sees forms that only exist after JavaScript runs.
 */
export class ScriptedBackend implements SubmissionBackend {
  readonly kind = 'scripted' as const;

  constructor(
    private readonly tools: FormTools,
    private readonly limiter: RequestRateLimiter,
    private readonly sessions: BrowserSessionFactory,
    private readonly timeouts: Pick<TimeoutConfig, 'navigationMs' | 'submitMs' | 'settleMs'>,
  ) {}

  async submit(ctx: SubmissionContext): Promise<BackendResult> {
    const log = ctx.logger.child({ backend: this.kind });

    let session: BrowserSession;
    try {
      session = await this.sessions.open();
    } catch (err) {
      log.warn('Browser unavailable', { error: errorMessage(err) });
      return failedResult(this.kind, 'backend_unavailable', `Could not start a browser: ${errorMessage(err)}`);
    }

    let challenge: BackendResult['challenge'];
    return withBrowserSession(session, log, async ({ page }) => {
      try {
        await this.navigate(page, ctx);

        const doc = new PlaywrightDocument(page);
        const prepared = await prepareForm(doc, ctx.message, this.tools, this.imageLoader(page), ctx.signal);
        if (prepared.challenge.present) challenge = prepared.challenge.kind;

        const scope = prepared.form.implicit
          ? page.locator('body')
          : page.locator('form').nth(prepared.form.index);

        await this.fill(scope, prepared);
        await this.injectCaptchaTokens(page, prepared);

        const control = await this.findSubmitControl(scope);
        if (!control) {
          throw new SubmissionFailure('submission_rejected', 'No visible submit control on the form', challenge);
        }

        await this.limiter.acquire(ctx.target.domain, ctx.signal);
        const response = await this.clickAndWait(page, control, prepared.form);
        await this.settle(page, log);

        const bodyText = await page.locator('body').innerText();
        const status = response?.status() ?? 200;
        const classification = classifyOutcome({ status, bodyText, url: page.url() });

        log.info('Scripted submission classified', {
          status,
          submitted: classification.submitted,
          signal: classification.signal,
        });
        return classifiedResult(this.kind, classification, status, challenge);
      } catch (err) {
        return resultFromError(this.kind, err, ctx.signal, challenge);
      }
    });
  }

  private async navigate(page: ScriptedPage, ctx: SubmissionContext): Promise<void> {
    await this.limiter.acquire(ctx.target.domain, ctx.signal);

    let response: Response | null;
    try {
      response = await page.goto(ctx.target.url, { waitUntil: 'domcontentloaded', timeout: this.timeouts.navigationMs });
    } catch (err) {
      if (ctx.signal?.aborted) throw err;
      throw new SubmissionFailure('fetch_failed', `Navigation to ${ctx.target.url} failed: ${errorMessage(err)}`);
    }

    if (response && response.status() >= 400) {
      throw new SubmissionFailure('fetch_failed', `Navigation to ${ctx.target.url} returned HTTP ${response.status()}`);
    }
    await this.settle(page, ctx.logger);
  }

  /** Wait for network quiet, bounded by the settle delay. */
  private async settle(page: ScriptedPage, log: Logger): Promise<void> {
    try {
      await page.waitForLoadState('networkidle', { timeout: this.timeouts.settleMs });
    } catch (err) {
      // Pages with long-polling never go idle; carry on with what has rendered
      log.debug('Page did not reach network idle', { error: errorMessage(err) });
    }
  }

  private async fill(scope: Locator, prepared: PreparedForm): Promise<void> {
    for (const { field, value } of prepared.filled.assignments) {
      if (!field.visible || field.disabled) continue;
      const control = scope.locator(`[name=${cssAttrValue(field.name)}]`).first();

      if (field.kind === 'select') {
        await control.selectOption({ index: 0 });
      } else if (TYPED_KINDS.has(field.kind) && value) {
        await control.click();
        await control.fill('');
        await control.pressSequentially(value, { delay: 10 });
      }
    }
  }

  /**
   * Write solver tokens into the response fields the widget reads, creating
   * them inside the form when the page has not rendered one.
   */
  private async injectCaptchaTokens(page: ScriptedPage, prepared: PreparedForm): Promise<void> {
    if (!prepared.challenge.present) return;

    for (const name of captchaFieldNames(prepared.form, prepared.challenge.kind)) {
      const value = prepared.filled.values.get(name);
      if (value === undefined) continue;

      await page.evaluate(
        ({ name, value, formIndex }) => {
          const root: HTMLElement = document.forms.item(formIndex) ?? document.body;
          const existing = Array.from(root.querySelectorAll(`[name="${CSS.escape(name)}"]`));
          let written = false;
          for (const el of existing) {
            if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) {
              el.value = value;
              written = true;
            }
          }
          if (!written) {
            const field = document.createElement('textarea');
            field.name = name;
            field.value = value;
            field.style.display = 'none';
            root.appendChild(field);
          }
        },
        { name, value, formIndex: prepared.form.index },
      );
    }
  }

  private async findSubmitControl(scope: Locator): Promise<Locator | null> {
    for (const selector of SUBMIT_SELECTORS) {
      for (const candidate of await scope.locator(selector).all()) {
        if (await candidate.isVisible()) return candidate;
      }
    }
    return null;
  }

  /**
   * Challenge images are fetched by the browser context, so the request
   * carries the session cookies of the page that will submit the answer.
   */
  private imageLoader(page: ScriptedPage): ImageLoader {
    return async (url) => {
      const response = await page.context().request.get(url, { timeout: this.timeouts.navigationMs });
      if (!response.ok()) {
        throw new Error(`GET ${url} returned HTTP ${response.status()}`);
      }
      return new Uint8Array(await response.body());
    };
  }

  /**
   * Click and wait for the response the submission produced, if any. The
   * listener is armed before the click; only main-frame navigations and
   * non-GET requests to the form's action count.
   */
  private async clickAndWait(page: ScriptedPage, control: Locator, form: FormCandidate): Promise<Response | null> {
    const navigation = page
      .waitForEvent('response', {
        predicate: (res) => isSubmissionResponse(res, page, form),
        timeout: this.timeouts.submitMs,
      })
      .then(
        (res) => res,
        // Script-driven forms often post with no navigation; classify on the page as it stands
        () => null,
      );

    await control.click();
    return navigation;
  }
}

function isSubmissionResponse(res: Response, page: ScriptedPage, form: FormCandidate): boolean {
  const request = res.request();
  if (request.isNavigationRequest()) return request.frame() === page.mainFrame();
  return request.method() !== 'GET' && sameEndpoint(request.url(), form.action);
}

function sameEndpoint(requestUrl: string, action: string): boolean {
  const a = new URL(requestUrl);
  const b = new URL(action);
  return a.origin === b.origin && a.pathname === b.pathname;
}
