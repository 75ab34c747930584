import { google, type gmail_v1 } from 'googleapis';
import type { MailboxClient, MailMessage, MailQuery } from './mailbox';

type GmailAuth = NonNullable<gmail_v1.Options['auth']>;

function decodeBase64Url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

export function stripTags(html: string): string {
  return html
    .replace(/<(style|script)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<br\s*\/?>|<\/(p|div|h\d|tr|li)>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/gi, ' ')
    .replace(/&amp;/gi, '&')
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&#39;|&apos;/gi, "'")
    .replace(/&quot;/gi, '"')
    .replace(/[ \t]+/g, ' ')
    .replace(/\s*\n\s*/g, '\n')
    .trim();
}

function collectBodies(part: gmail_v1.Schema$MessagePart, bodies: { plain: string[]; html: string[] }): void {
  const data = part.body?.data;
  if (data) {
    if (part.mimeType === 'text/plain') bodies.plain.push(decodeBase64Url(data));
    else if (part.mimeType === 'text/html') bodies.html.push(decodeBase64Url(data));
  }
  for (const child of part.parts ?? []) {
    collectBodies(child, bodies);
  }
}

function header(part: gmail_v1.Schema$MessagePart, name: string): string {
  const found = part.headers?.find((h) => h.name?.toLowerCase() === name.toLowerCase());
  return found?.value ?? '';
}

function receivedAt(message: gmail_v1.Schema$Message, payload: gmail_v1.Schema$MessagePart): Date {
  if (message.internalDate) {
    const ms = Number(message.internalDate);
    if (Number.isFinite(ms)) return new Date(ms);
  }
  const date = new Date(header(payload, 'Date'));
  return Number.isNaN(date.getTime()) ? new Date(0) : date;
}

/** Flattens a `format: 'full'` Gmail message. Returns null without an id or payload. */
export function parseGmailMessage(message: gmail_v1.Schema$Message): MailMessage | null {
  const payload = message.payload;
  if (!message.id || !payload) return null;

  const bodies: { plain: string[]; html: string[] } = { plain: [], html: [] };
  collectBodies(payload, bodies);

  const html = bodies.html.join('\n');
  const text = bodies.plain.length > 0 ? bodies.plain.join('\n') : stripTags(html);

  const parsed: MailMessage = {
    id: message.id,
    subject: header(payload, 'Subject'),
    from: header(payload, 'From'),
    receivedAt: receivedAt(message, payload),
    text: text || message.snippet || '',
  };
  if (html) parsed.html = html;
  return parsed;
}

export function buildSearchQuery(query: MailQuery): string {
  const parts = [`after:${Math.floor(query.since.getTime() / 1000)}`];
  if (query.from) parts.push(`from:${query.from}`);
  return parts.join(' ');
}

/** Read-only inbox access through the Gmail API. */
export class GmailMailbox implements MailboxClient {
  private gmail: gmail_v1.Gmail;

  constructor(auth: GmailAuth, private maxResults = 10) {
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  async listMessages(query: MailQuery): Promise<MailMessage[]> {
    const list = await this.gmail.users.messages.list({
      userId: 'me',
      q: buildSearchQuery(query),
      maxResults: this.maxResults,
    });

    const messages: MailMessage[] = [];
    for (const ref of list.data.messages ?? []) {
      if (!ref.id) continue;
      const full = await this.gmail.users.messages.get({ userId: 'me', id: ref.id, format: 'full' });
      const parsed = parseGmailMessage(full.data);
      if (parsed) messages.push(parsed);
    }
    return messages;
  }
}
