export interface GmailMessage {
  id: string;
  threadId?: string;
  snippet?: string;
  internalDate?: string;
  labelIds?: string[];
  payload?: GmailPayload;
}

export interface GmailPayload {
  mimeType?: string;
  headers?: Array<{ name: string; value: string }>;
  body?: { size?: number; data?: string };
  parts?: GmailPayload[];
}

export interface ParsedEmail {
  id: string;
  threadId: string;
  from: string;
  replyTo: string;
  subject: string;
  messageId: string | null;
  body: string;
  receivedAt: Date;
}

export function getHeader(headers: GmailPayload['headers'], name: string): string | null {
  const header = headers?.find((entry) => entry.name.toLowerCase() === name.toLowerCase());
  return header?.value ?? null;
}

/** `"Ada Lovelace" <ada@example.com>` → `ada@example.com`; bare addresses pass through. */
export function emailAddress(value: string): string {
  const match = value.match(/<([^>]+)>/);
  return (match?.[1] ?? value).trim();
}

export function parseEmail(message: GmailMessage): ParsedEmail | null {
  const payload = message.payload;
  if (!payload) {
    return null;
  }

  const from = getHeader(payload.headers, 'From');
  if (!from) {
    return null;
  }

  const internal = Number(message.internalDate);
  const dateHeader = getHeader(payload.headers, 'Date');
  const receivedAt = Number.isFinite(internal) && internal > 0 ? new Date(internal) : new Date(dateHeader ?? 0);

  return {
    id: message.id,
    threadId: message.threadId ?? message.id,
    from: from.trim(),
    replyTo: emailAddress(getHeader(payload.headers, 'Reply-To') ?? from),
    subject: (getHeader(payload.headers, 'Subject') ?? '').trim(),
    messageId: getHeader(payload.headers, 'Message-ID') ?? getHeader(payload.headers, 'Message-Id'),
    body: (extractBody(payload) ?? message.snippet ?? '').trim(),
    receivedAt,
  };
}

function extractBody(payload: GmailPayload): string | null {
  if (payload.mimeType?.startsWith('multipart/') !== true && payload.body?.data) {
    return decodeBase64Url(payload.body.data);
  }
  if (payload.parts) {
    for (const part of payload.parts) {
      if (part.mimeType === 'text/plain' && part.body?.data) {
        return decodeBase64Url(part.body.data);
      }
    }
    for (const part of payload.parts) {
      const nested = extractBody(part);
      if (nested) {
        return nested;
      }
    }
  }
  return null;
}

function decodeBase64Url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf8');
}

export function replySubject(subject: string): string {
  if (!subject) return 'Re: your message';
  return /^re:/i.test(subject) ? subject : `Re: ${subject}`;
}

function encodeHeader(value: string): string {
  // RFC 2047 encoded-word for anything outside printable ASCII
  return /^[\x20-\x7e]*$/.test(value) ? value : `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;
}

/** Build the base64url `raw` payload for users.messages.send. */
export function buildReplyMime(original: ParsedEmail, text: string): string {
  const lines = [
    `To: ${original.replyTo}`,
    `Subject: ${encodeHeader(replySubject(original.subject))}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: 8bit',
  ];
  if (original.messageId) {
    lines.push(`In-Reply-To: ${original.messageId}`, `References: ${original.messageId}`);
  }
  const mime = `${lines.join('\r\n')}\r\n\r\n${text}`;
  return Buffer.from(mime, 'utf8').toString('base64url');
}
