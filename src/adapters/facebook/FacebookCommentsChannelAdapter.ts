import type { ChannelPort, Checkpoint, InboundMessage } from '../../ports/ChannelPort.js';
import { createLogger } from '../../utils/logger.js';
import { ChannelError } from '../../utils/errors.js';
import { graphRequest, graphRequestAll, type FacebookCredentials, type GraphList } from './graphClient.js';

interface GraphPost {
  id: string;
}

interface GraphComment {
  id: string;
  message?: string;
  created_time: string;
  from?: { id: string; name?: string };
}

const RECENT_POSTS_LIMIT = 10;

/**
 * The social inbox: comments left on the page's recent posts. Comments written
 * by the page itself are skipped so the assistant never answers its own replies.
 */
export class FacebookCommentsChannelAdapter implements ChannelPort {
  readonly channel = 'social' as const;
  readonly pollable = true;
  private readonly logger = createLogger({ adapter: 'FacebookCommentsChannelAdapter' });

  constructor(private readonly credentials: FacebookCredentials) {}

  async fetchNew(checkpoint: Checkpoint): Promise<InboundMessage[]> {
    const logger = this.logger.child({ method: 'fetchNew' });
    const token = encodeURIComponent(this.credentials.accessToken);
    try {
      const posts = await graphRequest<GraphList<GraphPost>>(
        `${this.credentials.pageId}/posts?fields=id&limit=${RECENT_POSTS_LIMIT}&access_token=${token}`
      );

      const since = Math.floor(checkpoint.lastReceivedAt / 1000);
      const messages: InboundMessage[] = [];
      for (const post of posts.data ?? []) {
        // All pages; the poller advances past the newest comment it sees
        const comments = await graphRequestAll<GraphComment>(
          `${post.id}/comments?fields=id,message,created_time,from&filter=stream&since=${since}&access_token=${token}`
        );
        for (const comment of comments) {
          const message = this.toInbound(comment);
          if (message) {
            messages.push(message);
          }
        }
      }

      logger.info({ posts: posts.data?.length ?? 0, comments: messages.length }, 'Fetched page comments');
      return messages;
    } catch (error) {
      logger.error({ error }, 'Failed to fetch page comments');
      throw new ChannelError('social', 'Failed to fetch page comments', { cause: error });
    }
  }

  async sendReply(threadRef: string, text: string): Promise<void> {
    const logger = this.logger.child({ method: 'sendReply', commentId: threadRef });
    try {
      await graphRequest<{ id?: string }>(`${threadRef}/comments`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ message: text, access_token: this.credentials.accessToken }),
      });
      logger.info({ textLength: text.length }, 'Comment reply posted');
    } catch (error) {
      logger.error({ error }, 'Failed to reply to comment');
      throw new ChannelError('social', 'Failed to reply to comment', { cause: error });
    }
  }

  private toInbound(comment: GraphComment): InboundMessage | null {
    const body = comment.message?.trim();
    if (!body || comment.from?.id === this.credentials.pageId) {
      return null;
    }
    // Graph timestamps end in +0000, which Date only reads reliably as +00:00
    const receivedAt = new Date(comment.created_time.replace(/([+-]\d{2})(\d{2})$/, '$1:$2'));
    if (Number.isNaN(receivedAt.getTime())) {
      return null;
    }
    return {
      channel: this.channel,
      externalId: comment.id,
      sender: comment.from?.name ?? comment.from?.id ?? 'unknown',
      body,
      receivedAt,
      threadRef: comment.id,
    };
  }
}
