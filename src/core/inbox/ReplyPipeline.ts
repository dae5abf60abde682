import type { ChannelPort, InboundMessage, PushHandler } from '../../ports/ChannelPort.js';
import type { IntentClassifier } from '../intent/IntentClassifier.js';
import type { CapabilityRegistry } from '../capabilities/CapabilityRegistry.js';
import { describeFailures } from '../capabilities/types.js';
import type { DedupRepository, DedupState } from '../../persistence/repositories/DedupRepository.js';
import type { ReplyLogRepository } from '../../persistence/repositories/ReplyLogRepository.js';
import { SendFailure } from '../../utils/errors.js';
import { withTimeout } from '../../utils/timeout.js';
import { createLogger, type Logger } from '../../utils/logger.js';

export type MessageStatus = 'sent' | 'retry' | 'exhausted' | 'duplicate';

export interface MessageOutcome {
  status: MessageStatus;
  /** True once nothing more will ever be done for this message */
  handled: boolean;
  attempt: number;
  /** Stored dedup state when the message was a duplicate */
  existingState?: DedupState;
}

export type PipelinePhase = 'classifying' | 'replying';

export interface ReplyPipelineDependencies {
  classifier: IntentClassifier;
  registry: CapabilityRegistry;
  dedup: DedupRepository;
  replyLogs: ReplyLogRepository;
}

export interface ReplyPipelineOptions {
  maxAttempts: number;
  sendTimeoutMs: number;
}

/**
 * reserve -> classify -> generate -> send -> commit for one inbound message.
 * Polled and pushed messages both come through here, so the dedup ledger sees
 * every delivery of the same message.
 *
 * The dedup commit happens after the send. A crash between the two leaves the
 * reservation behind and the message is answered again once the lease runs out.
 */
export class ReplyPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly port: ChannelPort,
    private readonly deps: ReplyPipelineDependencies,
    private readonly options: ReplyPipelineOptions
  ) {
    this.logger = createLogger({ service: 'ReplyPipeline', channel: port.channel });
  }

  get channel(): ChannelPort['channel'] {
    return this.port.channel;
  }

  async handle(message: InboundMessage, onPhase?: (phase: PipelinePhase) => void): Promise<MessageOutcome> {
    const logger = this.logger.child({ externalId: message.externalId });
    const reservation = this.deps.dedup.reserve(message.channel, message.externalId);
    if (!reservation.acquired) {
      logger.debug({ state: reservation.state }, 'Duplicate message skipped');
      return {
        status: 'duplicate',
        handled: reservation.state === 'committed' || reservation.state === 'exhausted',
        attempt: reservation.attempt,
        existingState: reservation.state,
      };
    }

    const attempt = reservation.attempt;
    let generatedText = '';
    try {
      onPhase?.('classifying');
      const classification = this.deps.classifier.forInboundMessage(message);

      onPhase?.('replying');
      const reply = await this.deps.registry.invoke(classification.intent, classification.parameters);
      if (!reply.ok) {
        throw new SendFailure(message.channel, message.externalId, {
          cause: new Error(describeFailures(reply.failures)),
        });
      }
      generatedText = reply.result.text;

      await withTimeout(
        this.port.sendReply(message.threadRef, generatedText),
        this.options.sendTimeoutMs,
        `${message.channel} send`
      );
    } catch (error) {
      return this.recordFailure(message, attempt, generatedText, error);
    }

    this.deps.dedup.commit(message.channel, message.externalId);
    this.deps.replyLogs.append({
      channel: message.channel,
      externalId: message.externalId,
      sender: message.sender,
      originalBody: message.body,
      generatedText,
      sendStatus: 'sent',
      attemptCount: attempt,
    });
    logger.info({ attempt }, 'Auto-reply sent');
    return { status: 'sent', handled: true, attempt };
  }

  /**
   * Handler for push delivery. A reply still awaiting retry rejects, so the
   * pushing side sees an error and redelivers the message later.
   */
  pushHandler(): PushHandler {
    return async (message) => {
      const outcome = await this.handle(message);
      if (outcome.status === 'retry') {
        throw new SendFailure(message.channel, message.externalId);
      }
    };
  }

  private recordFailure(
    message: InboundMessage,
    attempt: number,
    generatedText: string,
    error: unknown
  ): MessageOutcome {
    const logger = this.logger.child({ externalId: message.externalId });
    const state = this.deps.dedup.release(message.channel, message.externalId, this.options.maxAttempts);

    if (state !== 'exhausted') {
      logger.warn({ error, attempt, maxAttempts: this.options.maxAttempts }, 'Auto-reply failed; will retry');
      return { status: 'retry', handled: false, attempt };
    }

    this.deps.replyLogs.append({
      channel: message.channel,
      externalId: message.externalId,
      sender: message.sender,
      originalBody: message.body,
      generatedText,
      sendStatus: 'failed',
      attemptCount: attempt,
    });
    logger.error({ error, attempt }, 'Auto-reply failed permanently');
    return { status: 'exhausted', handled: true, attempt };
  }
}
