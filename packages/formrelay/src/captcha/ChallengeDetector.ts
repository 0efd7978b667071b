/**
 * ChallengeDetector: finds the CAPTCHA guarding a page, if any.
 *
 * Checks run in priority order against the DomDocument, so the same rules
 * apply to fetched markup and to the live DOM of a browser session:
 *
 *   1. reCAPTCHA: `.g-recaptcha`, a recaptcha iframe, or a `[data-sitekey]`
 *      that is not part of an hCaptcha widget
 *   2. hCaptcha: `.h-captcha` or an hcaptcha iframe
 *   3. Image: an <img> whose src contains "captcha"
 *   4. Unknown: the word "captcha" in the visible text
 */

import type { DomDocument, DomElement } from '../engine/dom/DomDocument.js';
import { NO_CHALLENGE, type CaptchaChallenge } from './types.js';

const RECAPTCHA_SELECTORS = ['.g-recaptcha', 'iframe[src*="recaptcha"]'];
const HCAPTCHA_SELECTORS = ['.h-captcha', 'iframe[src*="hcaptcha"]'];

async function findFirst(doc: DomDocument, selectors: string[]): Promise<DomElement | undefined> {
  for (const selector of selectors) {
    const [match] = await doc.findAll(selector);
    if (match) return match;
  }
  return undefined;
}

async function firstSiteKey(elements: DomElement[]): Promise<string | undefined> {
  for (const el of elements) {
    const key = await el.attr('data-sitekey');
    if (key) return key;
  }
  return undefined;
}

async function isHCaptchaWidget(el: DomElement): Promise<boolean> {
  const className = (await el.attr('class')) ?? '';
  return className.split(/\s+/).includes('h-captcha');
}

/** Site key from an iframe src such as `.../anchor?k=KEY` or `...&sitekey=KEY`. */
function siteKeyFromSrc(src: string | undefined): string | undefined {
  if (!src) return undefined;
  try {
    const params = new URL(src, 'https://placeholder.invalid').searchParams;
    return params.get('k') ?? params.get('sitekey') ?? undefined;
  } catch {
    return undefined;
  }
}

export class ChallengeDetector {
  async detect(doc: DomDocument): Promise<CaptchaChallenge> {
    const recaptcha = await this.detectRecaptcha(doc);
    if (recaptcha) return recaptcha;

    const hcaptcha = await findFirst(doc, HCAPTCHA_SELECTORS);
    if (hcaptcha) {
      const siteKey =
        (await firstSiteKey(await doc.findAll('.h-captcha[data-sitekey]'))) ??
        siteKeyFromSrc(await hcaptcha.attr('src'));
      return { present: true, kind: 'hcaptcha', siteKey };
    }

    for (const img of await doc.findAll('img[src]')) {
      const src = await img.attr('src');
      if (src && src.toLowerCase().includes('captcha')) {
        return { present: true, kind: 'image', imageSource: src };
      }
    }

    if ((await doc.bodyText()).toLowerCase().includes('captcha')) {
      return { present: true, kind: 'unknown' };
    }

    return NO_CHALLENGE;
  }

  private async detectRecaptcha(doc: DomDocument): Promise<CaptchaChallenge | null> {
    const widget = await findFirst(doc, RECAPTCHA_SELECTORS);

    const keyed: DomElement[] = [];
    for (const el of await doc.findAll('[data-sitekey]')) {
      if (!(await isHCaptchaWidget(el))) keyed.push(el);
    }

    if (!widget && keyed.length === 0) return null;

    const siteKey = (await firstSiteKey(keyed)) ?? siteKeyFromSrc(await widget?.attr('src'));
    return { present: true, kind: 'recaptcha_v2', siteKey };
  }
}
