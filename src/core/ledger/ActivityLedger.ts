import type { CommandRecord, CommandRepository } from '../../persistence/repositories/CommandRepository.js';
import type { ReplyLog, ReplyLogRepository } from '../../persistence/repositories/ReplyLogRepository.js';
import type { SocialPost, SocialPostRepository } from '../../persistence/repositories/SocialPostRepository.js';

export interface DayCounts {
  commands: number;
  replies: number;
  failedReplies: number;
  posts: number;
}

export interface StatusSnapshot {
  commands_today: number;
  replies_today: number;
  failed_replies_today: number;
  posts_today: number;
  recent_commands: Array<{
    id: number;
    command_text: string;
    intent: string | null;
    status: string;
    created_at: string;
  }>;
  recent_replies: Array<{
    id: number;
    channel: string;
    sender: string;
    status: string;
    created_at: string;
  }>;
  recent_posts: Array<{
    id: number;
    platform: string;
    topic: string;
    status: string;
    created_at: string;
  }>;
}

export interface CommandHistoryPage {
  commands: Array<{
    id: number;
    command_text: string;
    intent: string | null;
    status: string;
    result: string | null;
    created_at: string;
    completed_at: string | null;
  }>;
  pagination: { page: number; pages: number; per_page: number; total: number };
}

/** [start, end) of the local calendar day containing `now`. */
/** Offset of `timeZone` from UTC at `instant`, in ms (second resolution). */
function zoneOffsetMs(instant: number, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(new Date(instant));
  const part = (type: Intl.DateTimeFormatPartTypes): number => Number(parts.find((p) => p.type === type)?.value ?? 0);
  const wallAsUtc = Date.UTC(part('year'), part('month') - 1, part('day'), part('hour'), part('minute'), part('second'));
  return wallAsUtc - Math.floor(instant / 1000) * 1000;
}

/** Midnight to midnight around `now`, in `timeZone` when given and the process zone otherwise. */
export function localDayBounds(now: Date, timeZone?: string): { start: number; end: number } {
  if (timeZone) {
    const instant = now.getTime();
    const offset = zoneOffsetMs(instant, timeZone);
    const wall = new Date(instant + offset);
    const startWall = Date.UTC(wall.getUTCFullYear(), wall.getUTCMonth(), wall.getUTCDate());
    const endWall = Date.UTC(wall.getUTCFullYear(), wall.getUTCMonth(), wall.getUTCDate() + 1);
    return {
      start: startWall - zoneOffsetMs(startWall - offset, timeZone),
      end: endWall - zoneOffsetMs(endWall - offset, timeZone),
    };
  }
  const start = new Date(now);
  start.setHours(0, 0, 0, 0);
  const end = new Date(start);
  end.setDate(start.getDate() + 1);
  return { start: start.getTime(), end: end.getTime() };
}

/**
 * Read side of the command/reply/post history. Every read is a single SELECT
 * against WAL-mode SQLite, so dashboards never wait on the pollers.
 */
export class ActivityLedger {
  constructor(
    private readonly commands: CommandRepository,
    private readonly replies: ReplyLogRepository,
    private readonly posts: SocialPostRepository,
    private readonly timeZone?: string
  ) {}

  recentCommands(limit = 5): CommandRecord[] {
    return this.commands.recent(limit);
  }

  recentReplies(limit = 5): ReplyLog[] {
    return this.replies.recent(limit);
  }

  recentPosts(limit = 5): SocialPost[] {
    return this.posts.recent(limit);
  }

  countsForDay(now: Date = new Date()): DayCounts {
    const { start, end } = localDayBounds(now, this.timeZone);
    return {
      commands: this.commands.countBetween(start, end),
      replies: this.replies.countBetween(start, end, 'sent'),
      failedReplies: this.replies.countBetween(start, end, 'failed'),
      posts: this.posts.countBetween(start, end),
    };
  }

  statusSnapshot(now: Date = new Date(), limit = 5): StatusSnapshot {
    const counts = this.countsForDay(now);
    return {
      commands_today: counts.commands,
      replies_today: counts.replies,
      failed_replies_today: counts.failedReplies,
      posts_today: counts.posts,
      recent_commands: this.recentCommands(limit).map((cmd) => ({
        id: cmd.id,
        command_text: cmd.rawText,
        intent: cmd.intent,
        status: cmd.status,
        created_at: new Date(cmd.createdAt).toISOString(),
      })),
      recent_replies: this.recentReplies(limit).map((reply) => ({
        id: reply.id,
        channel: reply.channel,
        sender: reply.sender,
        status: reply.sendStatus,
        created_at: new Date(reply.createdAt).toISOString(),
      })),
      recent_posts: this.recentPosts(limit).map((post) => ({
        id: post.id,
        platform: post.platform,
        topic: post.topic,
        status: post.status,
        created_at: new Date(post.createdAt).toISOString(),
      })),
    };
  }

  commandHistory(page: number, perPage: number): CommandHistoryPage {
    const { items, total } = this.commands.page(page, perPage);
    return {
      commands: items.map((cmd) => ({
        id: cmd.id,
        command_text: cmd.rawText,
        intent: cmd.intent,
        status: cmd.status,
        result: cmd.resultText,
        created_at: new Date(cmd.createdAt).toISOString(),
        completed_at: cmd.completedAt === null ? null : new Date(cmd.completedAt).toISOString(),
      })),
      pagination: {
        page,
        pages: Math.ceil(total / perPage),
        per_page: perPage,
        total,
      },
    };
  }
}
