import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Database } from 'better-sqlite3';
import { openDatabase } from '../../persistence/database.js';
import { DedupRepository } from '../../persistence/repositories/DedupRepository.js';
import { ReplyLogRepository } from '../../persistence/repositories/ReplyLogRepository.js';
import { CheckpointRepository } from '../../persistence/repositories/CheckpointRepository.js';
import { IntentClassifier } from '../../core/intent/IntentClassifier.js';
import { CapabilityRegistry } from '../../core/capabilities/CapabilityRegistry.js';
import { TextChain } from '../../core/capabilities/TextChain.js';
import { CannedReplyCapability } from '../../core/capabilities/providers/AssistantCapabilities.js';
import { ReplyPipeline } from '../../core/inbox/ReplyPipeline.js';
import { InboxPoller, type CycleOutcome } from '../../core/inbox/InboxPoller.js';
import { PollSupervisor } from '../../core/inbox/PollSupervisor.js';
import { initialBackoff, nextBackoff, type BackoffPolicy } from '../../core/inbox/backoff.js';
import type { Channel } from '../../ports/ChannelPort.js';
import { FakeChannel, inbound } from '../support/FakeChannel.js';

const BASE = 300_000;
const POLICY: BackoffPolicy = { baseMs: BASE, maxMs: BASE * 8 };

describe('nextBackoff', () => {
  it('doubles on each failure up to the cap and resets on success', () => {
    const intervals: number[] = [];
    let state = initialBackoff(POLICY);
    intervals.push(state.intervalMs);
    for (const status of ['failed', 'failed', 'failed', 'failed', 'success'] as const) {
      state = nextBackoff(state, status, POLICY);
      intervals.push(state.intervalMs);
    }

    expect(intervals).toEqual([BASE, BASE * 2, BASE * 4, BASE * 8, BASE * 8, BASE]);
  });

  it('leaves the interval alone after partial or skipped cycles', () => {
    const backedOff = nextBackoff(initialBackoff(POLICY), 'failed', POLICY);

    expect(nextBackoff(backedOff, 'partial', POLICY)).toEqual(backedOff);
    expect(nextBackoff(backedOff, 'skipped', POLICY)).toEqual(backedOff);
  });
});

describe('PollSupervisor', () => {
  let db: Database;

  function pollerFor(port: FakeChannel): InboxPoller {
    const registry = new CapabilityRegistry({ timeoutMs: 1000 }).register('reply_generation', new CannedReplyCapability());
    const classifier = new IntentClassifier(new TextChain([], 1000), '{{COMMAND}}', { timeoutMs: 1000 });
    const pipeline = new ReplyPipeline(
      port,
      { classifier, registry, dedup: new DedupRepository(db), replyLogs: new ReplyLogRepository(db) },
      { maxAttempts: 3, sendTimeoutMs: 1000 }
    );
    return new InboxPoller(port, pipeline, new CheckpointRepository(db), { cycleDeadlineMs: 60_000, fetchTimeoutMs: 1000 });
  }

  beforeEach(() => {
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('backs a failing channel off base, 2x, 4x, 8x (capped) and resets after a success', async () => {
    const port = new FakeChannel('email');
    port.fetchError = new Error('connection reset');
    const supervisor = new PollSupervisor(POLICY).add(pollerFor(port));
    const intervals: number[] = [supervisor.intervalFor('email') ?? -1];

    for (let i = 0; i < 4; i++) {
      await supervisor.runNow('email');
      intervals.push(supervisor.intervalFor('email') ?? -1);
    }
    port.fetchError = null;
    await supervisor.runNow('email');
    intervals.push(supervisor.intervalFor('email') ?? -1);

    expect(intervals).toEqual([BASE, BASE * 2, BASE * 4, BASE * 8, BASE * 8, BASE]);
  });

  it('schedules the next run at the backed-off interval', async () => {
    vi.useFakeTimers();
    const port = new FakeChannel('email');
    port.fetchError = new Error('connection reset');
    const supervisor = new PollSupervisor(POLICY).add(pollerFor(port));

    supervisor.start();
    await vi.advanceTimersByTimeAsync(BASE - 1);
    expect(port.checkpointsSeen).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(port.checkpointsSeen).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(BASE * 2 - 1);
    expect(port.checkpointsSeen).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(port.checkpointsSeen).toHaveLength(2);

    supervisor.stop();
    await vi.advanceTimersByTimeAsync(BASE * 8);
    expect(port.checkpointsSeen).toHaveLength(2);
  });

  it('keeps backoff state per channel and reports every cycle on the bus', async () => {
    const failing = new FakeChannel('email');
    failing.fetchError = new Error('connection reset');
    const healthy = new FakeChannel('chat');
    healthy.inbox = [inbound('chat', '1', 1_700_000_000_000, 'hello')];
    const supervisor = new PollSupervisor(POLICY).add(pollerFor(failing)).add(pollerFor(healthy));
    const seen: Array<[Channel, CycleOutcome['status']]> = [];
    supervisor.on('cycle', (outcome) => seen.push([outcome.channel, outcome.status]));

    const outcomes = await supervisor.runNow();

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['failed', 'success']);
    expect(seen).toEqual([
      ['email', 'failed'],
      ['chat', 'success'],
    ]);
    expect(supervisor.intervalFor('email')).toBe(BASE * 2);
    expect(supervisor.intervalFor('chat')).toBe(BASE);
    expect(healthy.sent).toEqual([
      // 'hello' has five characters, which picks the third canned reply
      {
        threadRef: 'thread-1',
        text: "Hello! I've received your message and will get back to you soon. Thanks for getting in touch.",
      },
    ]);
  });

  it('turns a crashed cycle into a failed outcome and backs off', async () => {
    const poller = pollerFor(new FakeChannel('email'));
    vi.spyOn(poller, 'runCycle').mockRejectedValue(new Error('disk I/O error'));
    const supervisor = new PollSupervisor(POLICY).add(poller);

    const [outcome] = await supervisor.runNow('email');

    expect(outcome).toMatchObject({
      channel: 'email',
      status: 'failed',
      error: 'disk I/O error',
      checkpoint: { channel: 'email', lastReceivedAt: 0, lastExternalId: null, updatedAt: 0 },
    });
    expect(supervisor.intervalFor('email')).toBe(BASE * 2);
  });

  it('ignores channels it does not own', async () => {
    const supervisor = new PollSupervisor(POLICY);
    expect(await supervisor.runNow('social')).toEqual([]);
    expect(supervisor.intervalFor('social')).toBeUndefined();
  });
});
