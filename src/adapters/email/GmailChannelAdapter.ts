import type { ChannelPort, Checkpoint, InboundMessage } from '../../ports/ChannelPort.js';
import { createLogger } from '../../utils/logger.js';
import { ChannelError } from '../../utils/errors.js';
import { buildReplyMime, emailAddress, parseEmail, type GmailMessage, type ParsedEmail } from './gmailMessage.js';

export interface GmailCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  userId?: string;
}

interface GmailListResponse {
  messages?: Array<{ id: string; threadId: string }>;
  nextPageToken?: string;
}

const GMAIL_API = 'https://gmail.googleapis.com/gmail/v1/users';
const MAX_RESULTS = 20;

export class GmailChannelAdapter implements ChannelPort {
  readonly channel = 'email' as const;
  readonly pollable = true;
  private readonly logger = createLogger({ adapter: 'GmailChannelAdapter' });
  private readonly userId: string;

  constructor(private readonly credentials: GmailCredentials) {
    this.userId = credentials.userId ?? 'me';
  }

  async fetchNew(checkpoint: Checkpoint): Promise<InboundMessage[]> {
    const logger = this.logger.child({ method: 'fetchNew' });
    try {
      const accessToken = await this.fetchAccessToken();
      // after: has one-second resolution, the poller drops anything at or behind the checkpoint
      const afterSeconds = Math.floor(checkpoint.lastReceivedAt / 1000);
      const search = afterSeconds > 0 ? `in:inbox is:unread after:${afterSeconds}` : 'in:inbox is:unread';
      const ids = await this.listMessageIds(search, accessToken);

      const messages: InboundMessage[] = [];
      for (const id of ids) {
        const email = await this.getEmail(id, accessToken, 'full');
        if (!email || !email.body) {
          continue;
        }
        messages.push({
          channel: this.channel,
          externalId: email.id,
          sender: emailAddress(email.from),
          body: email.subject ? `${email.subject}\n\n${email.body}` : email.body,
          receivedAt: email.receivedAt,
          threadRef: email.id,
        });
      }

      logger.info({ listed: ids.length, fetched: messages.length }, 'Fetched unread email');
      return messages;
    } catch (error) {
      logger.error({ error }, 'Failed to fetch email');
      throw new ChannelError('email', 'Failed to fetch email', { cause: error });
    }
  }

  /** Reply in the original thread, then mark the original read. */
  async sendReply(threadRef: string, text: string): Promise<void> {
    const logger = this.logger.child({ method: 'sendReply', messageId: threadRef });
    try {
      const accessToken = await this.fetchAccessToken();
      const original = await this.getEmail(threadRef, accessToken, 'metadata');
      if (!original) {
        throw new ChannelError('email', `Message ${threadRef} has no headers to reply to`, { status: 400 });
      }

      await this.gmailRequest(`${GMAIL_API}/${this.userId}/messages/send`, accessToken, {
        method: 'POST',
        body: JSON.stringify({ raw: buildReplyMime(original, text), threadId: original.threadId }),
      });

      try {
        await this.gmailRequest(`${GMAIL_API}/${this.userId}/messages/${threadRef}/modify`, accessToken, {
          method: 'POST',
          body: JSON.stringify({ removeLabelIds: ['UNREAD'] }),
        });
      } catch (error) {
        // The reply is out; the dedup ledger keeps the message from being answered twice
        logger.warn({ error }, 'Could not mark message read');
      }

      logger.info({ to: original.replyTo }, 'Reply sent');
    } catch (error) {
      logger.error({ error }, 'Failed to send reply');
      throw error instanceof ChannelError ? error : new ChannelError('email', 'Failed to send reply', { cause: error });
    }
  }

  /** Gmail lists newest first; read to the last page. */
  private async listMessageIds(search: string, accessToken: string): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;
    do {
      const page = pageToken ? `&pageToken=${encodeURIComponent(pageToken)}` : '';
      const url = `${GMAIL_API}/${this.userId}/messages?q=${encodeURIComponent(search)}&maxResults=${MAX_RESULTS}${page}`;
      const list = await this.gmailRequest<GmailListResponse>(url, accessToken);
      ids.push(...(list.messages ?? []).map((message) => message.id));
      pageToken = list.nextPageToken;
    } while (pageToken);
    return ids;
  }

  private async getEmail(id: string, accessToken: string, format: 'full' | 'metadata'): Promise<ParsedEmail | null> {
    const url = `${GMAIL_API}/${this.userId}/messages/${id}?format=${format}`;
    const message = await this.gmailRequest<GmailMessage>(url, accessToken);
    return parseEmail(message);
  }

  private async fetchAccessToken(): Promise<string> {
    const response = await fetch('https://oauth2.googleapis.com/token', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        refresh_token: this.credentials.refreshToken,
        grant_type: 'refresh_token',
      }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ChannelError('email', `Failed to refresh Gmail token: ${response.status} ${text}`, {
        status: response.status,
      });
    }

    const data = (await response.json()) as { access_token?: string };
    if (!data.access_token) {
      throw new ChannelError('email', 'Gmail token response missing access_token');
    }
    return data.access_token;
  }

  private async gmailRequest<T>(url: string, accessToken: string, init: RequestInit = {}): Promise<T> {
    const response = await fetch(url, {
      ...init,
      headers: { Authorization: `Bearer ${accessToken}`, 'Content-Type': 'application/json' },
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ChannelError('email', `Gmail API error: ${response.status} ${text}`, { status: response.status });
    }

    return (await response.json()) as T;
  }
}
