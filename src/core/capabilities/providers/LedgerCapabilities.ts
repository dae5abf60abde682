import type { ActivityLedger } from '../../ledger/ActivityLedger.js';
import type { CapabilityProvider, CapabilityResult } from '../types.js';

export class SystemStatusCapability implements CapabilityProvider {
  readonly name = 'activity-ledger';

  constructor(
    private readonly ledger: ActivityLedger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async invoke(): Promise<CapabilityResult> {
    const counts = this.ledger.countsForDay(this.clock());
    return {
      text:
        `System is running. Today I've processed ${counts.commands} commands, ` +
        `sent ${counts.replies} auto-replies and created ${counts.posts} social posts.`,
      data: {
        commands_today: counts.commands,
        replies_today: counts.replies,
        failed_replies_today: counts.failedReplies,
        posts_today: counts.posts,
      },
    };
  }
}

export class AutoReplyStatusCapability implements CapabilityProvider {
  readonly name = 'activity-ledger';

  constructor(private readonly ledger: ActivityLedger) {}

  async invoke(): Promise<CapabilityResult> {
    const replies = this.ledger.recentReplies(5);
    const latest = replies[0];
    if (!latest) {
      return {
        text: 'Auto-reply is active and watching for new messages. No replies have been sent yet.',
        data: { recent_replies: [] },
      };
    }

    const sent = replies.filter((reply) => reply.sendStatus === 'sent').length;
    return {
      text:
        `Auto-reply is active. ${sent} of the last ${replies.length} replies went out. ` +
        `The latest was on ${latest.channel} to ${latest.sender.slice(0, 20)}.`,
      data: {
        recent_replies: replies.map((reply) => ({
          channel: reply.channel,
          sender: reply.sender,
          status: reply.sendStatus,
          created_at: new Date(reply.createdAt).toISOString(),
        })),
      },
    };
  }
}
