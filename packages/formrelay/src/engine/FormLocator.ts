import type { DomDocument, DomElement } from './dom/DomDocument.js';
import { cssAttrValue } from './dom/DomDocument.js';
import type { FieldDescriptor, FieldKind, FormCandidate, FormMethod } from './types.js';

// ── Heuristics ────────────────────────────────────────────────────────

export const CONTACT_KEYWORDS = [
  'contact',
  'message',
  'inquiry',
  'quote',
  'consultation',
  'appointment',
  'booking',
  'request',
  'form',
] as const;

/** Phrases that mark a page as a contact form even without a <form> element. */
export const IMPLICIT_FORM_PHRASES = [
  'contact form',
  'contact us',
  'get in touch',
  'send message',
  'inquiry form',
  'quote request',
  'free consultation',
] as const;

export const IMPLICIT_FORM_TOKENS = ['<form', 'method=', 'action=', '<textarea'] as const;

const CONTROL_SELECTOR = 'input, textarea, select';

const INPUT_KINDS: ReadonlySet<string> = new Set<FieldKind>([
  'text',
  'email',
  'tel',
  'hidden',
  'checkbox',
  'radio',
]);

function containsKeyword(value: string | undefined): boolean {
  if (!value) return false;
  const lower = value.toLowerCase();
  return CONTACT_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function isInputKind(value: string): value is FieldKind {
  return INPUT_KINDS.has(value);
}

// ── Field description ─────────────────────────────────────────────────

async function fieldKind(el: DomElement): Promise<FieldKind | null> {
  const tag = await el.tagName();
  if (tag === 'textarea') return 'textarea';
  if (tag === 'select') return 'select';
  if (tag !== 'input') return null;

  const type = ((await el.attr('type')) ?? 'text').trim().toLowerCase() || 'text';
  return isInputKind(type) ? type : null;
}

async function labelFor(doc: DomDocument, el: DomElement, id: string | undefined): Promise<string | undefined> {
  if (id) {
    const [label] = await doc.findAll(`label[for=${cssAttrValue(id)}]`);
    if (label) {
      const text = await label.text();
      if (text) return text;
    }
  }
  return el.attr('aria-label');
}

/**
 * Describe one control. Returns null for controls that are never submitted:
 * no name, or an input type outside the supported kinds (submit, file, ...).
 */
export async function describeField(doc: DomDocument, el: DomElement): Promise<FieldDescriptor | null> {
  const name = await el.attr('name');
  if (!name) return null;

  const kind = await fieldKind(el);
  if (!kind) return null;

  const id = (await el.attr('id')) || undefined;
  const field: FieldDescriptor = {
    name,
    id,
    kind,
    visible: kind === 'hidden' ? false : await el.isVisible(),
    disabled: (await el.attr('disabled')) !== undefined,
    placeholder: await el.attr('placeholder'),
    label: await labelFor(doc, el, id),
    value: await el.attr('value'),
    checked: (await el.attr('checked')) !== undefined,
  };

  if (kind === 'select') {
    const [first] = await el.findAll('option');
    if (first) {
      field.firstOptionValue = (await first.attr('value')) ?? (await first.text());
    }
  }

  return field;
}

async function describeFields(doc: DomDocument, scope: Pick<DomElement, 'findAll'>): Promise<FieldDescriptor[]> {
  const fields: FieldDescriptor[] = [];
  for (const control of await scope.findAll(CONTROL_SELECTOR)) {
    const field = await describeField(doc, control);
    if (field) fields.push(field);
  }
  return fields;
}

// ── Candidate construction ────────────────────────────────────────────

/** Resolve a form action against the page URL; non-http(s) actions fall back to the page. */
export function resolveAction(action: string | undefined, pageUrl: string): string {
  const raw = action?.trim();
  if (!raw) return pageUrl;
  try {
    const resolved = new URL(raw, pageUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return pageUrl;
    return resolved.href;
  } catch {
    return pageUrl;
  }
}

function formMethod(raw: string | undefined): FormMethod {
  return raw?.trim().toUpperCase() === 'GET' ? 'GET' : 'POST';
}

async function toCandidate(doc: DomDocument, form: DomElement, index: number): Promise<FormCandidate> {
  return {
    action: resolveAction(await form.attr('action'), doc.url),
    method: formMethod(await form.attr('method')),
    fields: await describeFields(doc, form),
    index,
    implicit: false,
  };
}

async function hasContactAttributes(form: DomElement): Promise<boolean> {
  return (
    containsKeyword(await form.attr('action')) ||
    containsKeyword(await form.attr('id')) ||
    containsKeyword(await form.attr('class'))
  );
}

async function hasContactInput(form: DomElement): Promise<boolean> {
  for (const input of await form.findAll('input')) {
    if (containsKeyword(await input.attr('name')) || containsKeyword(await input.attr('placeholder'))) {
      return true;
    }
  }
  return false;
}

async function looksLikeImplicitForm(doc: DomDocument): Promise<boolean> {
  const markup = (await doc.markup()).toLowerCase();
  const text = (await doc.bodyText()).toLowerCase();
  return (
    IMPLICIT_FORM_PHRASES.some((phrase) => markup.includes(phrase) || text.includes(phrase)) ||
    IMPLICIT_FORM_TOKENS.some((token) => markup.includes(token))
  );
}

// ── Locator ───────────────────────────────────────────────────────────

/**
 * Picks the most plausible contact form on a page.
 *
 * Order: a form whose action/id/class carries a contact keyword, then a form
 * with an input whose name/placeholder carries one, then the first form. A page
 * without any <form> becomes an implicit form (posted back to the page URL)
 * only when its text or markup shows contact-form signals. Returns null when
 * nothing qualifies.
 */
export class FormLocator {
  async locate(doc: DomDocument): Promise<FormCandidate | null> {
    const forms = await doc.findAll('form');

    if (forms.length === 0) {
      if (!(await looksLikeImplicitForm(doc))) return null;
      return {
        action: doc.url,
        method: 'POST',
        fields: await describeFields(doc, doc),
        index: -1,
        implicit: true,
      };
    }

    for (const [index, form] of forms.entries()) {
      if (await hasContactAttributes(form)) return toCandidate(doc, form, index);
    }
    for (const [index, form] of forms.entries()) {
      if (await hasContactInput(form)) return toCandidate(doc, form, index);
    }
    return toCandidate(doc, forms[0], 0);
  }
}
