import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { vi } from 'vitest';
import type { BrowserSession, BrowserSessionFactory, ScriptedPage } from '../../src/backends/BrowserSession.js';

/**
 * A browser page whose DOM is static markup. Locators resolve with cheerio;
 * input actions are recorded in `actions` instead of running in a browser.
 */

export interface FakeRequest {
  isNavigationRequest(): boolean;
  frame(): object;
  method(): string;
  url(): string;
}

export interface FakeResponse {
  status(): number;
  request(): FakeRequest;
}

export interface ImageResponse {
  ok(): boolean;
  status(): number;
  body(): Promise<Buffer>;
}

export interface LivePageOptions {
  url?: string;
  /** Markup the page shows once a submit control is clicked */
  afterSubmit?: string;
  /** Responses offered to the page's response listener, in arrival order */
  responses?: (page: LivePage) => FakeResponse[];
}

const HIDDEN_STYLE = /(?:display\s*:\s*none|visibility\s*:\s*hidden)/i;

function isHidden($el: cheerio.Cheerio<Element>): boolean {
  return $el.attr('hidden') !== undefined || HIDDEN_STYLE.test($el.attr('style') ?? '');
}

/** Playwright text selectors become cheerio's :contains(). */
function toCheerioSelector(selector: string): string {
  return selector.replace(/:has-text\(/g, ':contains(');
}

export class FakeLocator {
  constructor(
    private readonly page: LivePage,
    private readonly resolve: () => Element[],
  ) {}

  async all(): Promise<FakeLocator[]> {
    return this.resolve().map((el) => new FakeLocator(this.page, () => [el]));
  }

  first(): FakeLocator {
    return this.nth(0);
  }

  nth(index: number): FakeLocator {
    return new FakeLocator(this.page, () => this.resolve().slice(index, index + 1));
  }

  locator(selector: string): FakeLocator {
    return new FakeLocator(this.page, () =>
      this.page.$(this.resolve()).find(toCheerioSelector(selector)).toArray(),
    );
  }

  async evaluate<T>(fn: (el: { tagName: string }) => T): Promise<T> {
    return fn({ tagName: this.element().tagName.toUpperCase() });
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.page.$(this.element()).attr(name) ?? null;
  }

  async textContent(): Promise<string> {
    return this.page.$(this.element()).text();
  }

  async innerText(): Promise<string> {
    const copy = this.page.$(this.element()).clone();
    copy.find('script, style').remove();
    return copy.text();
  }

  async isVisible(): Promise<boolean> {
    const [el] = this.resolve();
    if (!el) return false;
    const $el = this.page.$(el);
    if (el.tagName === 'input' && $el.attr('type') === 'hidden') return false;
    if (isHidden($el)) return false;
    return !$el.parents().toArray().some((parent) => isHidden(this.page.$(parent)));
  }

  async click(): Promise<void> {
    const el = this.element();
    const $el = this.page.$(el);
    this.page.actions.push(`click ${this.describe()}`);

    const submits =
      (el.tagName === 'button' && ($el.attr('type') ?? 'submit') === 'submit') ||
      (el.tagName === 'input' && $el.attr('type') === 'submit');
    if (submits && this.page.afterSubmit !== undefined) {
      this.page.load(this.page.afterSubmit);
    }
  }

  async fill(value: string): Promise<void> {
    this.page.actions.push(`fill ${this.describe()} "${value}"`);
  }

  async pressSequentially(text: string): Promise<void> {
    this.page.actions.push(`type ${this.describe()} "${text}"`);
  }

  async selectOption(option: { index: number }): Promise<void> {
    this.page.actions.push(`select ${this.describe()} #${option.index}`);
  }

  private element(): Element {
    const [el] = this.resolve();
    if (!el) throw new Error('Locator matched no element');
    return el;
  }

  private describe(): string {
    const $el = this.page.$(this.element());
    return $el.attr('name') ?? $el.text().trim();
  }
}

export class LivePage {
  $: cheerio.CheerioAPI;
  readonly actions: string[] = [];
  readonly afterSubmit?: string;
  readonly frame = { name: 'main' };
  /** Values written by the CAPTCHA token injection script */
  readonly injected = new Map<string, string>();

  readonly imageRequest = vi.fn(
    async (_url: string, _options?: { timeout?: number }): Promise<ImageResponse> => ({
      ok: () => true,
      status: () => 200,
      body: async () => Buffer.from([0x89, 0x50, 0x4e, 0x47]),
    }),
  );

  readonly goto = vi.fn(async (_url: string, _options?: unknown): Promise<{ status(): number } | null> => null);
  readonly waitForLoadState = vi.fn(async (_state?: string, _options?: unknown) => undefined);
  readonly url = vi.fn(() => this.pageUrl);
  readonly content = vi.fn(async () => this.$.html());
  readonly mainFrame = vi.fn(() => this.frame);
  readonly context = vi.fn(() => ({ request: { get: this.imageRequest } }));

  readonly evaluate = vi.fn(async (_script: unknown, arg: { name: string; value: string }) => {
    this.injected.set(arg.name, arg.value);
  });

  /** Mirrors Playwright: the first matching response, or a timeout. */
  readonly waitForEvent = vi.fn(
    async (_event: string, options: { predicate: (res: FakeResponse) => boolean; timeout?: number }) => {
      const match = this.responses.find((res) => options.predicate(res));
      if (!match) throw new Error(`Timeout ${options.timeout ?? 0}ms exceeded while waiting for event "response"`);
      return match;
    },
  );

  private readonly responses: FakeResponse[];

  constructor(
    html: string,
    private readonly pageUrl = 'https://shop.test/',
    options: Omit<LivePageOptions, 'url'> = {},
  ) {
    this.$ = cheerio.load(html);
    this.afterSubmit = options.afterSubmit;
    this.responses = options.responses?.(this) ?? [];
  }

  locator(selector: string): FakeLocator {
    return new FakeLocator(this, () => this.$<Element, string>(toCheerioSelector(selector)).toArray());
  }

  load(html: string): void {
    this.$ = cheerio.load(html);
  }

  /** A response to a request made by this page. */
  response(status: number, request: Partial<FakeRequest>): FakeResponse {
    const full: FakeRequest = {
      isNavigationRequest: () => false,
      frame: () => this.frame,
      method: () => 'GET',
      url: () => this.pageUrl,
      ...request,
    };
    return { status: () => status, request: () => full };
  }
}

export function livePage(html: string, options: LivePageOptions = {}): LivePage {
  return new LivePage(html, options.url, options);
}

export function liveSessions(page: LivePage) {
  const close = vi.fn(async () => undefined);
  const session: BrowserSession = { page: page as unknown as ScriptedPage, close };
  const factory = { open: vi.fn(async () => session) } satisfies BrowserSessionFactory;
  return { factory, close };
}
