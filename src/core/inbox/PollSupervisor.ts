import { EventEmitter } from 'eventemitter3';
import type { Channel } from '../../ports/ChannelPort.js';
import type { CycleOutcome, InboxPoller } from './InboxPoller.js';
import { initialBackoff, nextBackoff, type BackoffPolicy, type BackoffState } from './backoff.js';
import { initialCheckpoint } from '../../persistence/repositories/CheckpointRepository.js';
import { createLogger } from '../../utils/logger.js';

export interface SupervisorEvents {
  cycle: (outcome: CycleOutcome) => void;
}

interface ChannelTask {
  poller: InboxPoller;
  backoff: BackoffState;
  timer: NodeJS.Timeout | null;
}

/**
 * Owns one timer task per channel. Tasks report each cycle outcome on the bus;
 * the supervisor reacts by updating that channel's backoff and scheduling its
 * next run. Channels never see each other's state.
 */
export class PollSupervisor {
  private readonly logger = createLogger({ service: 'PollSupervisor' });
  private readonly bus = new EventEmitter<SupervisorEvents>();
  private readonly tasks = new Map<Channel, ChannelTask>();
  private running = false;

  constructor(private readonly policy: BackoffPolicy) {
    this.bus.on('cycle', (outcome) => this.onCycle(outcome));
  }

  add(poller: InboxPoller): this {
    this.tasks.set(poller.channel, { poller, backoff: initialBackoff(this.policy), timer: null });
    return this;
  }

  channels(): Channel[] {
    return [...this.tasks.keys()];
  }

  on<E extends keyof SupervisorEvents>(event: E, listener: SupervisorEvents[E]): this {
    this.bus.on(event, listener);
    return this;
  }

  intervalFor(channel: Channel): number | undefined {
    return this.tasks.get(channel)?.backoff.intervalMs;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    for (const [channel, task] of this.tasks) {
      this.schedule(channel, task.backoff.intervalMs);
    }
    this.logger.info({ channels: this.channels(), baseMs: this.policy.baseMs }, 'Poll supervisor started');
  }

  stop(): void {
    this.running = false;
    for (const task of this.tasks.values()) {
      if (task.timer) clearTimeout(task.timer);
      task.timer = null;
    }
    this.logger.info('Poll supervisor stopped');
  }

  /** Run one cycle now for `channel`, or for every channel. Outcomes also go through the bus. */
  async runNow(channel?: Channel): Promise<CycleOutcome[]> {
    const targets = channel ? [channel] : this.channels();
    const outcomes: CycleOutcome[] = [];
    for (const target of targets) {
      if (this.tasks.has(target)) {
        outcomes.push(await this.runTask(target));
      }
    }
    return outcomes;
  }

  private schedule(channel: Channel, delayMs: number): void {
    const task = this.tasks.get(channel);
    if (!task) return;
    if (task.timer) clearTimeout(task.timer);
    task.timer = setTimeout(() => {
      task.timer = null;
      void this.runTask(channel);
    }, delayMs);
  }

  private async runTask(channel: Channel): Promise<CycleOutcome> {
    const task = this.tasks.get(channel);
    if (!task) {
      throw new Error(`No poller registered for ${channel}`);
    }

    let outcome: CycleOutcome;
    try {
      outcome = await task.poller.runCycle();
    } catch (error) {
      // runCycle only rejects on storage faults; treat them like a failed fetch
      this.logger.error({ error, channel }, 'Poll cycle crashed');
      outcome = {
        channel,
        status: 'failed',
        fetched: 0,
        sent: 0,
        duplicates: 0,
        retrying: 0,
        exhausted: 0,
        abandoned: false,
        checkpoint: initialCheckpoint(channel),
        error: error instanceof Error ? error.message : String(error),
      };
    }

    this.bus.emit('cycle', outcome);
    return outcome;
  }

  private onCycle(outcome: CycleOutcome): void {
    const task = this.tasks.get(outcome.channel);
    if (!task) return;

    const previous = task.backoff.intervalMs;
    task.backoff = nextBackoff(task.backoff, outcome.status, this.policy);
    if (task.backoff.intervalMs !== previous) {
      this.logger.info(
        { channel: outcome.channel, from: previous, to: task.backoff.intervalMs, failures: task.backoff.consecutiveFailures },
        'Poll interval changed'
      );
    }

    if (this.running && outcome.status !== 'skipped') {
      this.schedule(outcome.channel, task.backoff.intervalMs);
    }
  }
}
