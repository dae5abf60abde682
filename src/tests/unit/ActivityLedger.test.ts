import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase } from '../../persistence/database.js';
import { CommandRepository } from '../../persistence/repositories/CommandRepository.js';
import { ReplyLogRepository } from '../../persistence/repositories/ReplyLogRepository.js';
import { SocialPostRepository } from '../../persistence/repositories/SocialPostRepository.js';
import { ActivityLedger, localDayBounds } from '../../core/ledger/ActivityLedger.js';
import { SystemStatusCapability, AutoReplyStatusCapability } from '../../core/capabilities/providers/LedgerCapabilities.js';

// Local time, so the tests hold in any TZ
const NOON = new Date(2025, 5, 14, 12, 0, 0);
const { start: DAY_START, end: DAY_END } = localDayBounds(NOON);

describe('localDayBounds', () => {
  it('spans local midnight to the next local midnight', () => {
    expect(new Date(DAY_START)).toEqual(new Date(2025, 5, 14, 0, 0, 0, 0));
    expect(new Date(DAY_END)).toEqual(new Date(2025, 5, 15, 0, 0, 0, 0));
  });

  it('buckets by the configured time zone instead of the process zone', () => {
    const lateEvening = new Date(Date.UTC(2024, 0, 15, 3, 0, 0));

    expect(localDayBounds(lateEvening, 'America/New_York')).toEqual({
      start: Date.UTC(2024, 0, 14, 5, 0, 0),
      end: Date.UTC(2024, 0, 15, 5, 0, 0),
    });
    expect(localDayBounds(lateEvening, 'UTC')).toEqual({
      start: Date.UTC(2024, 0, 15),
      end: Date.UTC(2024, 0, 16),
    });
  });

  it('keeps a day that starts on a clock change to its real length', () => {
    // Clocks go forward at 02:00 on 2024-03-10 in New York
    const { start, end } = localDayBounds(new Date(Date.UTC(2024, 2, 10, 18, 0, 0)), 'America/New_York');

    expect(start).toBe(Date.UTC(2024, 2, 10, 5, 0, 0));
    expect(end).toBe(Date.UTC(2024, 2, 11, 4, 0, 0));
  });
});

describe('ActivityLedger', () => {
  let commands: CommandRepository;
  let replies: ReplyLogRepository;
  let posts: SocialPostRepository;
  let ledger: ActivityLedger;

  function reply(externalId: string, sendStatus: 'sent' | 'failed', at: number): void {
    replies.append(
      { channel: 'email', externalId, sender: 'ada@example.com', originalBody: 'hi', generatedText: 'hello', sendStatus, attemptCount: 1 },
      at
    );
  }

  beforeEach(() => {
    const db = openDatabase(':memory:');
    commands = new CommandRepository(db);
    replies = new ReplyLogRepository(db);
    posts = new SocialPostRepository(db);
    ledger = new ActivityLedger(commands, replies, posts);
  });

  it('counts only what happened on the local day', () => {
    commands.create('yesterday', 'processing', DAY_START - 1);
    commands.create('midnight', 'processing', DAY_START);
    commands.create('noon', 'processing', NOON.getTime());
    commands.create('last minute', 'processing', DAY_END - 1);
    commands.create('tomorrow', 'processing', DAY_END);
    reply('r1', 'sent', DAY_START + 10);
    reply('r2', 'sent', DAY_END + 10);
    reply('r3', 'failed', NOON.getTime());
    posts.append({ platform: 'facebook', topic: 'launch', content: 'We launched', platformPostId: 'p1', status: 'posted' }, NOON.getTime());
    posts.append({ platform: 'facebook', topic: 'oops', content: 'Draft', status: 'failed' }, NOON.getTime());

    expect(ledger.countsForDay(NOON)).toEqual({ commands: 3, replies: 1, failedReplies: 1, posts: 1 });
  });

  it('builds the status payload newest first', () => {
    const first = commands.create('status', 'processing', NOON.getTime());
    commands.complete(first.id, 'ok', NOON.getTime());
    commands.create('draw a cat', 'processing', NOON.getTime() + 1000);
    reply('r1', 'sent', NOON.getTime());
    posts.append({ platform: 'facebook', topic: 'launch', content: 'We launched', status: 'posted' }, NOON.getTime());

    const snapshot = ledger.statusSnapshot(NOON, 5);

    expect(snapshot.commands_today).toBe(2);
    expect(snapshot.recent_commands).toEqual([
      {
        id: first.id + 1,
        command_text: 'draw a cat',
        intent: null,
        status: 'processing',
        created_at: new Date(NOON.getTime() + 1000).toISOString(),
      },
      { id: first.id, command_text: 'status', intent: null, status: 'completed', created_at: NOON.toISOString() },
    ]);
    expect(snapshot.recent_replies).toEqual([
      { id: 1, channel: 'email', sender: 'ada@example.com', status: 'sent', created_at: NOON.toISOString() },
    ]);
    expect(snapshot.recent_posts).toEqual([
      { id: 1, platform: 'facebook', topic: 'launch', status: 'posted', created_at: NOON.toISOString() },
    ]);
  });

  it('pages through command history', () => {
    for (let i = 0; i < 5; i++) {
      commands.create(`command ${i}`, 'processing', NOON.getTime() + i);
    }

    const page = ledger.commandHistory(3, 2);

    expect(page.pagination).toEqual({ page: 3, pages: 3, per_page: 2, total: 5 });
    expect(page.commands.map((cmd) => cmd.command_text)).toEqual(['command 0']);
  });

  it('feeds the status capabilities', async () => {
    commands.create('status', 'processing', NOON.getTime());
    reply('r1', 'sent', NOON.getTime());
    reply('r2', 'failed', NOON.getTime() + 1);

    const status = await new SystemStatusCapability(ledger, () => NOON).invoke();
    expect(status.text).toBe(
      "System is running. Today I've processed 1 commands, sent 1 auto-replies and created 0 social posts."
    );
    expect(status.data).toEqual({ commands_today: 1, replies_today: 1, failed_replies_today: 1, posts_today: 0 });

    const autoReply = await new AutoReplyStatusCapability(ledger).invoke();
    expect(autoReply.text).toBe('Auto-reply is active. 1 of the last 2 replies went out. The latest was on email to ada@example.com.');
  });

  it('reports an idle auto-reply history', async () => {
    expect((await new AutoReplyStatusCapability(ledger).invoke()).text).toBe(
      'Auto-reply is active and watching for new messages. No replies have been sent yet.'
    );
  });
});
