/**
 * Minimal DOM surface shared by static markup (cheerio) and a live browser
 * page (Playwright). Form location, field description and challenge detection
 * run against this interface only, so both submission backends apply the same
 * rules to what they see.
 */

export interface DomElement {
  /** Lower-cased tag name */
  tagName(): Promise<string>;
  attr(name: string): Promise<string | undefined>;
  /** Text content with whitespace collapsed */
  text(): Promise<string>;
  isVisible(): Promise<boolean>;
  findAll(selector: string): Promise<DomElement[]>;
}

export interface DomDocument {
  /** URL the document was loaded from; relative URLs resolve against it */
  readonly url: string;
  findAll(selector: string): Promise<DomElement[]>;
  /** Visible text of the body, whitespace collapsed */
  bodyText(): Promise<string>;
  /** Raw markup of the whole document */
  markup(): Promise<string>;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Quote a value for use inside a CSS attribute selector. */
export function cssAttrValue(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
