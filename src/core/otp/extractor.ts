import type { MailMessage } from '../../mail/mailbox';

export interface ExtractionRule {
  name: string;
  extract(text: string): string | undefined;
}

export interface ExtractedCode {
  code: string;
  rule: string;
}

const CODE_MESSAGE_PATTERN = /verification|security code|one[- ]time|passcode|\bcode\b|\botp\b/i;

const SIX_DIGITS = /(?<![A-Za-z0-9])\d{6}(?![A-Za-z0-9])/;
const FOUR_DIGITS = /(?<![A-Za-z0-9])\d{4}(?![A-Za-z0-9])/;
const THREE_THREE = /(?<![A-Za-z0-9])(\d{3})[ -](\d{3})(?![A-Za-z0-9])/;
const TWO_TWO_TWO = /(?<![A-Za-z0-9])(\d{2})[ -](\d{2})[ -](\d{2})(?![A-Za-z0-9])/;
const LABELED =
  /(?:security code|verification(?: code)?|passcode|one[- ]time (?:pass)?code|\bcode|\botp)\b[\s:]*(?:is\b[\s:]*)?([A-Za-z0-9]{4,8})(?![A-Za-z0-9])/gi;
const EMPHASIZED = /<(h1|h2|strong|b)\b[^>]*>\s*([A-Za-z0-9]{4,8})\s*<\/\1>/gi;

const hasDigit = (value: string) => /\d/.test(value);

/** Ordered: the first rule that matches a message decides its code. */
export const OTP_RULES: ExtractionRule[] = [
  { name: 'six-digit', extract: (text) => SIX_DIGITS.exec(text)?.[0] },
  { name: 'four-digit', extract: (text) => FOUR_DIGITS.exec(text)?.[0] },
  {
    name: 'separated-groups',
    extract: (text) => {
      const groups = THREE_THREE.exec(text) ?? TWO_TWO_TWO.exec(text);
      return groups ? groups.slice(1).join('') : undefined;
    },
  },
  {
    name: 'labeled',
    extract: (text) => {
      for (const match of text.matchAll(LABELED)) {
        const candidate = match[1];
        if (candidate && hasDigit(candidate)) return candidate;
      }
      return undefined;
    },
  },
];

export function extractCode(text: string, rules: ExtractionRule[] = OTP_RULES): ExtractedCode | undefined {
  for (const rule of rules) {
    const code = rule.extract(text);
    if (code) return { code, rule: rule.name };
  }
  return undefined;
}

function emphasizedCode(html: string): string | undefined {
  for (const match of html.matchAll(EMPHASIZED)) {
    const candidate = match[2];
    if (candidate && hasDigit(candidate)) return candidate;
  }
  return undefined;
}

export function looksLikeCodeMessage(message: MailMessage): boolean {
  return CODE_MESSAGE_PATTERN.test(`${message.subject}\n${message.text}`);
}

/**
 * Runs the rules over subject and body. Codes set in a heading or bold tag
 * of the HTML body are the last resort.
 */
export function extractCodeFromMessage(message: MailMessage): ExtractedCode | undefined {
  const fromText = extractCode(`${message.subject}\n${message.text}`);
  if (fromText) return fromText;

  const emphasized = message.html ? emphasizedCode(message.html) : undefined;
  return emphasized ? { code: emphasized, rule: 'emphasized-html' } : undefined;
}

/** Newest message with any code wins. */
export function selectCode(
  messages: MailMessage[]
): (ExtractedCode & { messageId: string }) | undefined {
  const newestFirst = [...messages].sort((a, b) => b.receivedAt.getTime() - a.receivedAt.getTime());
  for (const message of newestFirst) {
    if (!looksLikeCodeMessage(message)) continue;
    const extracted = extractCodeFromMessage(message);
    if (extracted) return { ...extracted, messageId: message.id };
  }
  return undefined;
}
