import { describe, expect, test } from 'vitest';
import type { gmail_v1 } from 'googleapis';
import { buildSearchQuery, parseGmailMessage, stripTags } from './gmail';

const encode = (text: string) => Buffer.from(text, 'utf-8').toString('base64url');

const headers = [
  { name: 'Subject', value: 'Security code for your application' },
  { name: 'From', value: 'Greenhouse <no-reply@us.greenhouse-mail.io>' },
];

describe('parseGmailMessage', () => {
  test('reads a single-part plain message', () => {
    const message: gmail_v1.Schema$Message = {
      id: 'abc',
      internalDate: '1772359200000',
      payload: { mimeType: 'text/plain', headers, body: { data: encode('Your verification code: 123456') } },
    };

    expect(parseGmailMessage(message)).toEqual({
      id: 'abc',
      subject: 'Security code for your application',
      from: 'Greenhouse <no-reply@us.greenhouse-mail.io>',
      receivedAt: new Date(1772359200000),
      text: 'Your verification code: 123456',
    });
  });

  test('walks nested parts and keeps the HTML body', () => {
    const html = '<p>Copy this code</p><h1>Ab3dE5fG</h1>';
    const message: gmail_v1.Schema$Message = {
      id: 'nested',
      internalDate: '1772359200000',
      payload: {
        mimeType: 'multipart/mixed',
        headers,
        parts: [
          {
            mimeType: 'multipart/alternative',
            parts: [
              { mimeType: 'text/plain', body: { data: encode('Copy this code: Ab3dE5fG') } },
              { mimeType: 'text/html', body: { data: encode(html) } },
            ],
          },
        ],
      },
    };

    const parsed = parseGmailMessage(message);

    expect(parsed?.text).toBe('Copy this code: Ab3dE5fG');
    expect(parsed?.html).toBe(html);
  });

  test('strips tags when there is only an HTML body', () => {
    const message: gmail_v1.Schema$Message = {
      id: 'html',
      payload: {
        mimeType: 'text/html',
        headers: [...headers, { name: 'Date', value: 'Sun, 01 Mar 2026 10:00:00 +0000' }],
        body: { data: encode('<div>Your code is&nbsp;<b>654321</b></div>') },
      },
    };

    const parsed = parseGmailMessage(message);

    expect(parsed?.text).toBe('Your code is 654321');
    expect(parsed?.receivedAt).toEqual(new Date('2026-03-01T10:00:00Z'));
  });

  test('returns null without an id', () => {
    expect(parseGmailMessage({ payload: { mimeType: 'text/plain' } })).toBeNull();
  });
});

describe('stripTags', () => {
  test('drops style blocks and decodes entities', () => {
    expect(stripTags('<style>p { color: red }</style><p>Tom &amp; Jerry</p>')).toBe('Tom & Jerry');
  });
});

describe('buildSearchQuery', () => {
  test('searches after the epoch second, optionally by sender', () => {
    const since = new Date('2026-03-01T10:00:00.900Z');

    expect(buildSearchQuery({ since })).toBe('after:1772359200');
    expect(buildSearchQuery({ since, from: 'greenhouse-mail.io' })).toBe('after:1772359200 from:greenhouse-mail.io');
  });
});
