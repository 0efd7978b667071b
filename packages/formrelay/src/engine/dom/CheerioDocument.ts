import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { collapseWhitespace, type DomDocument, type DomElement } from './DomDocument.js';

const NON_VISIBLE_TEXT = 'script, style, noscript, template';

const HIDDEN_STYLE = /(?:display\s*:\s*none|visibility\s*:\s*hidden)/i;

function hiddenByMarkup($el: cheerio.Cheerio<Element>): boolean {
  if ($el.attr('hidden') !== undefined) return true;
  if ($el.attr('aria-hidden') === 'true') return true;
  const style = $el.attr('style');
  return style !== undefined && HIDDEN_STYLE.test(style);
}

class CheerioElement implements DomElement {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly el: Element,
  ) {}

  async tagName(): Promise<string> {
    return this.el.tagName.toLowerCase();
  }

  async attr(name: string): Promise<string | undefined> {
    return this.$(this.el).attr(name);
  }

  async text(): Promise<string> {
    return collapseWhitespace(this.$(this.el).text());
  }

  /**
   * Static markup has no layout, so visibility is approximated from the
   * element and its ancestors: `hidden`, `aria-hidden`, inline display/visibility
   * styles and hidden inputs.
   */
  async isVisible(): Promise<boolean> {
    const $el = this.$(this.el);
    if (this.el.tagName.toLowerCase() === 'input' && ($el.attr('type') ?? '').toLowerCase() === 'hidden') {
      return false;
    }
    if (hiddenByMarkup($el)) return false;
    for (const ancestor of $el.parents().toArray()) {
      if (hiddenByMarkup(this.$(ancestor))) return false;
    }
    return true;
  }

  async findAll(selector: string): Promise<DomElement[]> {
    return this.$(this.el)
      .find(selector)
      .toArray()
      .map((child) => new CheerioElement(this.$, child));
  }
}

/** DomDocument over fetched HTML. */
export class CheerioDocument implements DomDocument {
  private readonly $: cheerio.CheerioAPI;

  constructor(
    private readonly html: string,
    readonly url: string,
  ) {
    this.$ = cheerio.load(html || '');
  }

  async findAll(selector: string): Promise<DomElement[]> {
    return this.$<Element, string>(selector)
      .toArray()
      .map((el) => new CheerioElement(this.$, el));
  }

  async bodyText(): Promise<string> {
    return visibleText(this.$);
  }

  async markup(): Promise<string> {
    return this.html;
  }
}

function visibleText($: cheerio.CheerioAPI): string {
  const body = $('body').clone();
  body.find(NON_VISIBLE_TEXT).remove();
  return collapseWhitespace(body.text());
}

/** Reduce an HTML response body to the text a reader would see. */
export function htmlToText(html: string): string {
  return visibleText(cheerio.load(html || ''));
}
