import type { Locator, Page } from 'playwright';
import { collapseWhitespace, type DomDocument, type DomElement } from './DomDocument.js';

/** The part of a Playwright page the document reads. */
export type LivePage = Pick<Page, 'url' | 'locator' | 'content'>;

export class PlaywrightElement implements DomElement {
  constructor(readonly locator: Locator) {}

  async tagName(): Promise<string> {
    return this.locator.evaluate((el) => el.tagName.toLowerCase());
  }

  async attr(name: string): Promise<string | undefined> {
    const value = await this.locator.getAttribute(name);
    return value ?? undefined;
  }

  async text(): Promise<string> {
    return collapseWhitespace((await this.locator.textContent()) ?? '');
  }

  async isVisible(): Promise<boolean> {
    return this.locator.isVisible();
  }

  async findAll(selector: string): Promise<DomElement[]> {
    const children = await this.locator.locator(selector).all();
    return children.map((child) => new PlaywrightElement(child));
  }
}

/** DomDocument over the live DOM of a Playwright page. */
export class PlaywrightDocument implements DomDocument {
  constructor(private readonly page: LivePage) {}

  get url(): string {
    return this.page.url();
  }

  async findAll(selector: string): Promise<PlaywrightElement[]> {
    const matches = await this.page.locator(selector).all();
    return matches.map((match) => new PlaywrightElement(match));
  }

  async bodyText(): Promise<string> {
    return collapseWhitespace(await this.page.locator('body').innerText());
  }

  async markup(): Promise<string> {
    return this.page.content();
  }
}
