import type { Channel, ChannelPort, Checkpoint, InboundMessage } from '../../ports/ChannelPort.js';
import type { CheckpointRepository } from '../../persistence/repositories/CheckpointRepository.js';
import { compareMarkers } from '../../persistence/repositories/CheckpointRepository.js';
import type { ReplyPipeline } from './ReplyPipeline.js';
import type { CycleStatus } from './backoff.js';
import { withTimeout } from '../../utils/timeout.js';
import { createLogger, type Logger } from '../../utils/logger.js';

export type PollerState = 'idle' | 'fetching' | 'classifying' | 'replying';

export interface CycleOutcome {
  channel: Channel;
  status: CycleStatus;
  fetched: number;
  sent: number;
  duplicates: number;
  retrying: number;
  exhausted: number;
  /** The cycle hit its deadline before every message was looked at */
  abandoned: boolean;
  checkpoint: Checkpoint;
  error?: string;
}

export interface InboxPollerOptions {
  cycleDeadlineMs: number;
  fetchTimeoutMs: number;
  clock?: () => number;
}

function marker(message: InboundMessage): { receivedAt: number; externalId: string } {
  return { receivedAt: message.receivedAt.getTime(), externalId: message.externalId };
}

/**
 * Polls one channel. Cycles are single-flight: a call made while a cycle is
 * still running returns a `skipped` outcome instead of starting a second one.
 */
export class InboxPoller {
  private readonly logger: Logger;
  private readonly clock: () => number;
  private state: PollerState = 'idle';
  private running = false;

  constructor(
    private readonly port: ChannelPort,
    private readonly pipeline: ReplyPipeline,
    private readonly checkpoints: CheckpointRepository,
    private readonly options: InboxPollerOptions
  ) {
    this.logger = createLogger({ service: 'InboxPoller', channel: port.channel });
    this.clock = options.clock ?? Date.now;
  }

  get channel(): Channel {
    return this.port.channel;
  }

  getState(): PollerState {
    return this.state;
  }

  async runCycle(): Promise<CycleOutcome> {
    const checkpoint = this.checkpoints.get(this.channel);
    const outcome: CycleOutcome = {
      channel: this.channel,
      status: 'success',
      fetched: 0,
      sent: 0,
      duplicates: 0,
      retrying: 0,
      exhausted: 0,
      abandoned: false,
      checkpoint,
    };

    if (this.running) {
      this.logger.debug('Previous cycle still running; skipping');
      return { ...outcome, status: 'skipped' };
    }

    this.running = true;
    const deadline = this.clock() + this.options.cycleDeadlineMs;
    try {
      this.state = 'fetching';
      let batch: InboundMessage[];
      try {
        batch = await withTimeout(this.port.fetchNew(checkpoint), this.options.fetchTimeoutMs, `${this.channel} fetch`);
      } catch (error) {
        this.logger.warn({ error }, 'Fetch failed');
        return { ...outcome, status: 'failed', error: error instanceof Error ? error.message : String(error) };
      }

      const pending = this.newerThan(batch, checkpoint);
      outcome.fetched = pending.length;
      let watermark: InboundMessage | undefined;
      let prefixIntact = true;
      let allHandled = true;

      for (const [index, message] of pending.entries()) {
        if (this.clock() >= deadline) {
          outcome.abandoned = true;
          allHandled = false;
          this.logger.warn({ remaining: pending.length - index }, 'Cycle deadline reached');
          break;
        }

        let handled = false;
        try {
          const result = await this.pipeline.handle(message, (phase) => {
            this.state = phase;
          });
          handled = result.handled;
          if (result.status === 'sent') outcome.sent++;
          else if (result.status === 'duplicate') outcome.duplicates++;
          else if (result.status === 'retry') outcome.retrying++;
          else outcome.exhausted++;
        } catch (error) {
          outcome.retrying++;
          this.logger.error({ error, externalId: message.externalId }, 'Message handling failed');
        }

        if (!handled) {
          allHandled = false;
          prefixIntact = false;
        } else if (prefixIntact) {
          watermark = message;
        }
      }

      if (watermark) {
        outcome.checkpoint = this.checkpoints.advance(this.channel, marker(watermark));
      }
      outcome.status = allHandled ? 'success' : 'partial';
      this.logger.info(
        {
          status: outcome.status,
          fetched: outcome.fetched,
          sent: outcome.sent,
          duplicates: outcome.duplicates,
          retrying: outcome.retrying,
          exhausted: outcome.exhausted,
        },
        'Poll cycle finished'
      );
      return outcome;
    } finally {
      this.state = 'idle';
      this.running = false;
    }
  }

  /** Drop anything at or behind the checkpoint, collapse repeats, sort oldest first. */
  private newerThan(batch: InboundMessage[], checkpoint: Checkpoint): InboundMessage[] {
    const floor = { receivedAt: checkpoint.lastReceivedAt, externalId: checkpoint.lastExternalId };
    const unique = new Map<string, InboundMessage>();
    for (const message of batch) {
      if (compareMarkers(marker(message), floor) > 0 && !unique.has(message.externalId)) {
        unique.set(message.externalId, message);
      }
    }
    return [...unique.values()].sort((a, b) => compareMarkers(marker(a), marker(b)));
  }
}
