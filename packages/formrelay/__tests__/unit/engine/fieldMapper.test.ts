import { describe, expect, test } from 'vitest';
import { FieldMapper, captchaFieldNames, classifyField } from '../../../src/engine/FieldMapper.js';
import { MESSAGE, SENDER, field, form } from '../../fixtures/forms.js';

const mapper = new FieldMapper(SENDER);

describe('classifyField', () => {
  test('email outranks name', () => {
    expect(classifyField(field('customer_email_name'))).toBe('email');
  });

  test('input types decide before hints', () => {
    expect(classifyField(field('whatever', { kind: 'email' }))).toBe('email');
    expect(classifyField(field('whatever', { kind: 'tel' }))).toBe('phone');
  });

  test('reads id, placeholder and label as hints', () => {
    expect(classifyField(field('f1', { id: 'Mobile' }))).toBe('phone');
    expect(classifyField(field('f2', { placeholder: 'Topic of your request' }))).toBe('subject');
    expect(classifyField(field('f3', { label: 'Your question' }))).toBe('message');
    expect(classifyField(field('f4', { label: 'Full Name' }))).toBe('name');
  });

  test('the field name outranks words in its label', () => {
    expect(classifyField(field('your-name', { label: 'Your name (we reply by email)' }))).toBe('name');
    expect(classifyField(field('f5', { placeholder: 'Phone', label: 'Email us or leave a number' }))).toBe('phone');
  });

  test('unmatched fields are unknown', () => {
    expect(classifyField(field('company'))).toBe('unknown');
  });
});

describe('FieldMapper.map', () => {
  test('fills sender identity and message by role', () => {
    const filled = mapper.map(
      form([
        field('full_name'),
        field('customer_email'),
        field('phone_number'),
        field('subject_line'),
        field('msg'),
      ]),
      MESSAGE,
    );

    expect(Object.fromEntries(filled.values)).toEqual({
      full_name: 'Test Sender',
      customer_email: 'sender@example.test',
      phone_number: '555-000-1111',
      subject_line: 'Partnership',
      msg: MESSAGE.body,
    });
    expect(filled.assignments.map((a) => a.role)).toEqual(['name', 'email', 'phone', 'subject', 'message']);
  });

  test('hidden fields are submitted byte-for-byte', () => {
    const token = 'a+b/c==&x=1 ';
    const filled = mapper.map(form([field('csrf', { kind: 'hidden', visible: false, value: token })]), MESSAGE);

    expect(filled.values.get('csrf')).toBe(token);
  });

  test('a hidden field without a value is submitted empty', () => {
    const filled = mapper.map(form([field('ref', { kind: 'hidden', visible: false })]), MESSAGE);

    expect(filled.values.get('ref')).toBe('');
  });

  test('only checked checkboxes are submitted, defaulting to "on"', () => {
    const filled = mapper.map(
      form([
        field('newsletter', { kind: 'checkbox', checked: true }),
        field('terms', { kind: 'checkbox', checked: true, value: 'yes' }),
        field('spam', { kind: 'checkbox' }),
      ]),
      MESSAGE,
    );

    expect(Object.fromEntries(filled.values)).toEqual({ newsletter: 'on', terms: 'yes' });
  });

  test('the first checked radio of a group wins', () => {
    const filled = mapper.map(
      form([
        field('pref', { kind: 'radio', value: 'email' }),
        field('pref', { kind: 'radio', value: 'phone', checked: true }),
        field('pref', { kind: 'radio', value: 'post', checked: true }),
      ]),
      MESSAGE,
    );

    expect(filled.values.get('pref')).toBe('phone');
    expect(filled.assignments).toHaveLength(1);
  });

  test('selects take their first option', () => {
    const filled = mapper.map(
      form([field('dept', { kind: 'select', firstOptionValue: 'sales' }), field('empty', { kind: 'select' })]),
      MESSAGE,
    );

    expect(filled.values.get('dept')).toBe('sales');
    expect(filled.values.get('empty')).toBe('');
  });

  test('every textarea gets the message body', () => {
    const filled = mapper.map(form([field('notes', { kind: 'textarea' })]), MESSAGE);

    expect(filled.values.get('notes')).toBe(MESSAGE.body);
    expect(filled.assignments[0].role).toBe('message');
  });

  test('invisible text fields keep their default', () => {
    const filled = mapper.map(
      form([field('email_confirm', { visible: false }), field('website', { visible: false, value: 'x' })]),
      MESSAGE,
    );

    expect(filled.values.get('email_confirm')).toBe('');
    expect(filled.values.get('website')).toBe('x');
  });

  test('disabled fields are left out', () => {
    const filled = mapper.map(form([field('name', { disabled: true })]), MESSAGE);

    expect(filled.values.has('name')).toBe(false);
  });

  test('only the first field of a role gets the role value', () => {
    const filled = mapper.map(
      form([field('first_name'), field('last_name', { value: 'prefilled' }), field('company')]),
      MESSAGE,
    );

    expect(filled.values.get('first_name')).toBe('Test Sender');
    expect(filled.values.get('last_name')).toBe('prefilled');
    expect(filled.values.get('company')).toBe('');
  });

  test('a textarea claims the message role before text fields', () => {
    const filled = mapper.map(form([field('body', { kind: 'textarea' }), field('comments')]), MESSAGE);

    expect(filled.values.get('body')).toBe(MESSAGE.body);
    expect(filled.values.get('comments')).toBe('');
  });
});

describe('captcha tokens', () => {
  const solution = { kind: 'recaptcha_v2' as const, token: 'tok-1', latencyMs: 5, provider: 'fake' };

  test('field names per challenge kind', () => {
    const f = form([field('verify_captcha')]);

    expect(captchaFieldNames(f, 'recaptcha_v2')).toEqual(['g-recaptcha-response']);
    expect(captchaFieldNames(f, 'hcaptcha')).toEqual(['h-captcha-response', 'g-recaptcha-response']);
    expect(captchaFieldNames(f, 'image')).toEqual(['verify_captcha']);
    expect(captchaFieldNames(form([field('code')]), 'image')).toEqual(['captcha']);
  });

  test('applyCaptcha adds the token without touching the original map', () => {
    const f = form([field('full_name')]);
    const filled = mapper.map(f, MESSAGE);

    const withToken = mapper.applyCaptcha(filled, f, 'recaptcha_v2', solution);

    expect(withToken.values.get('g-recaptcha-response')).toBe('tok-1');
    expect(withToken.values.get('full_name')).toBe('Test Sender');
    expect(filled.values.has('g-recaptcha-response')).toBe(false);
  });
});
