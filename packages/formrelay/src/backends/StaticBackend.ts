import { CheerioDocument, htmlToText } from '../engine/dom/CheerioDocument.js';
import { SubmissionFailure } from '../engine/errors.js';
import { prepareForm, type FormTools } from '../engine/FormPreparation.js';
import type { HttpResponse, HttpSession } from '../engine/HttpSession.js';
import { classifyOutcome } from '../engine/OutcomeClassifier.js';
import { domainOf } from '../engine/target.js';
import type { BackendResult, FilledForm, FormCandidate } from '../engine/types.js';
import type { RequestRateLimiter } from '../security/rateLimit.js';
import { classifiedResult, failedResult, resultFromError } from './results.js';
import type { SubmissionBackend, SubmissionContext } from './types.js';

/**
 * Replays the located form as one plain HTTP request, no browser involved.
 * Cheap, and enough for server-rendered forms.
 */
export class StaticBackend implements SubmissionBackend {
  readonly kind = 'static' as const;

  constructor(
    private readonly tools: FormTools,
    private readonly limiter: RequestRateLimiter,
  ) {}

  async submit(ctx: SubmissionContext): Promise<BackendResult> {
    const log = ctx.logger.child({ backend: this.kind });
    let challenge: BackendResult['challenge'];

    try {
      const page = ctx.page ?? (await this.fetchPage(ctx));
      if (!page.ok) {
        return failedResult(this.kind, 'fetch_failed', page.reason);
      }

      const doc = new CheerioDocument(page.html, page.url);
      const prepared = await prepareForm(doc, ctx.message, this.tools, (url) => ctx.session.getBytes(url), ctx.signal);
      if (prepared.challenge.present) challenge = prepared.challenge.kind;

      if (prepared.form.implicit && prepared.form.fields.length === 0) {
        throw new SubmissionFailure('no_form_found', `Contact signals on ${page.url} but no named controls to send`);
      }

      log.info('Replaying form', {
        action: prepared.form.action,
        method: prepared.form.method,
        fields: prepared.filled.values.size,
        implicit: prepared.form.implicit,
      });

      const response = await this.replay(prepared.form, prepared.filled, ctx.session, ctx.signal);
      const bodyText = response.contentType.includes('html') ? htmlToText(response.body) : response.body;
      const classification = classifyOutcome({ status: response.status, bodyText, url: response.url });

      log.info('Form replay classified', {
        status: response.status,
        submitted: classification.submitted,
        signal: classification.signal,
      });
      return classifiedResult(this.kind, classification, response.status, challenge);
    } catch (err) {
      return resultFromError(this.kind, err, ctx.signal, challenge);
    }
  }

  /**
   * Send the filled form to its action: GET with the values in the query,
   * otherwise a urlencoded POST. Rate-limited against the action's domain.
   */
  async replay(
    form: FormCandidate,
    filled: FilledForm,
    session: HttpSession,
    signal?: AbortSignal,
  ): Promise<HttpResponse> {
    await this.limiter.acquire(domainOf(form.action), signal);

    const params = new URLSearchParams();
    for (const [name, value] of filled.values) {
      params.append(name, value);
    }

    if (form.method === 'GET') {
      const url = new URL(form.action);
      for (const [name, value] of params) {
        url.searchParams.set(name, value);
      }
      return session.send(url.toString(), { method: 'GET' });
    }
    return session.send(form.action, { method: 'POST', body: params });
  }

  private async fetchPage(ctx: SubmissionContext) {
    await this.limiter.acquire(ctx.target.domain, ctx.signal);
    return ctx.session.getPage(ctx.target.url);
  }
}
