import { describe, expect, test } from 'vitest';
import { ChallengeDetector } from '../../../src/captcha/ChallengeDetector.js';
import { CheerioDocument } from '../../../src/engine/dom/CheerioDocument.js';

const detector = new ChallengeDetector();

function detect(body: string) {
  return detector.detect(new CheerioDocument(`<html><body>${body}</body></html>`, 'https://shop.test/contact'));
}

describe('ChallengeDetector', () => {
  test('finds a reCAPTCHA widget and its site key', async () => {
    const challenge = await detect('<form><div class="g-recaptcha" data-sitekey="6Lc-test"></div></form>');

    expect(challenge).toEqual({ present: true, kind: 'recaptcha_v2', siteKey: '6Lc-test' });
  });

  test('reads the site key from a reCAPTCHA iframe', async () => {
    const challenge = await detect(
      '<iframe src="https://www.google.com/recaptcha/api2/anchor?ar=1&k=iframe-key&co=x"></iframe>',
    );

    expect(challenge).toEqual({ present: true, kind: 'recaptcha_v2', siteKey: 'iframe-key' });
  });

  test('a bare data-sitekey counts as reCAPTCHA', async () => {
    const challenge = await detect('<div data-sitekey="bare-key"></div>');

    expect(challenge).toEqual({ present: true, kind: 'recaptcha_v2', siteKey: 'bare-key' });
  });

  test('an hCaptcha widget is not taken for reCAPTCHA', async () => {
    const challenge = await detect('<div class="h-captcha" data-sitekey="h-key"></div>');

    expect(challenge).toEqual({ present: true, kind: 'hcaptcha', siteKey: 'h-key' });
  });

  test('reCAPTCHA wins when both widgets are present', async () => {
    const challenge = await detect(
      '<div class="h-captcha" data-sitekey="h-key"></div><div class="g-recaptcha" data-sitekey="g-key"></div>',
    );

    expect(challenge).toEqual({ present: true, kind: 'recaptcha_v2', siteKey: 'g-key' });
  });

  test('finds an image challenge', async () => {
    const challenge = await detect('<img src="/logo.png"><img src="/lib/CaptchaImage.php?id=3">');

    expect(challenge).toEqual({ present: true, kind: 'image', imageSource: '/lib/CaptchaImage.php?id=3' });
  });

  test('the word captcha alone is an unknown challenge', async () => {
    const challenge = await detect('<p>Please complete the CAPTCHA below.</p>');

    expect(challenge).toEqual({ present: true, kind: 'unknown' });
  });

  test('captcha inside a script is not visible text', async () => {
    const challenge = await detect('<script>var captcha = false;</script><p>Hello</p>');

    expect(challenge).toEqual({ present: false });
  });

  test('a plain page has no challenge', async () => {
    expect(await detect('<form><input name="email"></form>')).toEqual({ present: false });
  });
});
