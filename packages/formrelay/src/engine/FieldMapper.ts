import type { SenderIdentity } from '../config/engine.js';
import type { CaptchaKind, CaptchaSolution } from '../captcha/types.js';
import type {
  FieldAssignment,
  FieldDescriptor,
  FieldRole,
  FilledForm,
  FormCandidate,
  OutreachMessage,
} from './types.js';

type AssignableRole = Exclude<FieldRole, 'unknown'>;

/**
 * Keyword lists per role, checked in this order. Email comes first so a field
 * such as `customer_email_name` is never taken for a name field.
 */
export const ROLE_KEYWORDS: ReadonlyArray<readonly [AssignableRole, readonly string[]]> = [
  ['email', ['email', 'e-mail', 'mail']],
  ['phone', ['phone', 'tel', 'mobile', 'cell']],
  ['subject', ['subject', 'topic', 'regarding']],
  ['message', ['message', 'comment', 'inquiry', 'enquiry', 'content', 'description', 'details', 'msg', 'question']],
  ['name', ['name', 'fullname', 'first', 'last', 'contact']],
];

const TEXT_LIKE = new Set(['text', 'email', 'tel']);

/**
 * Hints in the order they are trusted. The name and placeholder describe the
 * field itself; id and label are read only when those match nothing, since
 * labels often carry unrelated words ("Your name (we reply by email)").
 */
function hints(field: FieldDescriptor): string[] {
  return [field.name, field.placeholder, field.id, field.label]
    .filter((hint): hint is string => Boolean(hint))
    .map((hint) => hint.toLowerCase());
}

function roleFor(hint: string): AssignableRole | undefined {
  for (const [role, keywords] of ROLE_KEYWORDS) {
    if (keywords.some((keyword) => hint.includes(keyword))) return role;
  }
  return undefined;
}

export function classifyField(field: FieldDescriptor): FieldRole {
  if (field.kind === 'email') return 'email';
  if (field.kind === 'tel') return 'phone';

  for (const hint of hints(field)) {
    const role = roleFor(hint);
    if (role) return role;
  }
  return 'unknown';
}

/**
 * Builds the name→value map submitted for a located form.
 */
export class FieldMapper {
  constructor(private readonly sender: SenderIdentity) {}

  map(form: FormCandidate, message: OutreachMessage): FilledForm {
    const roleValues: Record<AssignableRole, string> = {
      name: this.sender.name,
      email: this.sender.email,
      phone: this.sender.phone,
      subject: message.subject,
      message: message.body,
    };

    const values = new Map<string, string>();
    const assignments: FieldAssignment[] = [];
    const takenRoles = new Set<FieldRole>();
    const answeredRadios = new Set<string>();

    const assign = (field: FieldDescriptor, role: FieldRole, value: string) => {
      values.set(field.name, value);
      assignments.push({ field, role, value });
    };

    for (const field of form.fields) {
      if (!field.name || field.disabled) continue;

      switch (field.kind) {
        case 'hidden':
          assign(field, 'unknown', field.value ?? '');
          break;

        case 'checkbox':
          if (field.checked) assign(field, 'unknown', field.value ?? 'on');
          break;

        case 'radio':
          if (field.checked && !answeredRadios.has(field.name)) {
            answeredRadios.add(field.name);
            assign(field, 'unknown', field.value ?? 'on');
          }
          break;

        case 'select':
          assign(field, 'unknown', field.firstOptionValue ?? '');
          break;

        case 'textarea':
          assign(field, 'message', message.body);
          takenRoles.add('message');
          break;

        default: {
          if (!TEXT_LIKE.has(field.kind)) break;
          if (!field.visible) {
            // Honeypots stay at their default
            assign(field, 'unknown', field.value ?? '');
            break;
          }
          const role = classifyField(field);
          if (role !== 'unknown' && !takenRoles.has(role)) {
            takenRoles.add(role);
            assign(field, role, roleValues[role]);
          } else {
            assign(field, role, field.value ?? '');
          }
        }
      }
    }

    return { values, assignments };
  }

  /**
   * Add a solved CAPTCHA token under the field name the site expects.
   */
  applyCaptcha(filled: FilledForm, form: FormCandidate, kind: CaptchaKind, solution: CaptchaSolution): FilledForm {
    const values = new Map(filled.values);
    for (const name of captchaFieldNames(form, kind)) {
      values.set(name, solution.token);
    }
    return { values, assignments: filled.assignments };
  }
}

export function captchaFieldNames(form: FormCandidate, kind: CaptchaKind): string[] {
  switch (kind) {
    case 'recaptcha_v2':
      return ['g-recaptcha-response'];
    case 'hcaptcha':
      return ['h-captcha-response', 'g-recaptcha-response'];
    default: {
      const named = form.fields.find((field) => field.name.toLowerCase().includes('captcha'));
      return [named?.name ?? 'captcha'];
    }
  }
}
