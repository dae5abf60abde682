import type { IntentClassifier } from '../intent/IntentClassifier.js';
import type { Intent } from '../intent/types.js';
import type { CapabilityRegistry } from '../capabilities/CapabilityRegistry.js';
import { describeFailures } from '../capabilities/types.js';
import type {
  CommandRepository,
  TerminalCommandStatus,
} from '../../persistence/repositories/CommandRepository.js';
import { isTerminal } from '../../persistence/repositories/CommandRepository.js';
import { ProviderUnavailable, StaleProcessingRecord } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export const GENERIC_FAILURE_MESSAGE = "Sorry, I couldn't complete that request right now.";
export const ORPHANED_REASON = 'orphaned';

export interface CommandOutcome {
  commandId: number;
  status: TerminalCommandStatus;
  success: boolean;
  /** Safe to show the user; provider diagnostics stay in the record's error detail */
  message: string;
  intent: Intent | null;
  data?: Record<string, unknown>;
}

export interface CommandExecutorOptions {
  orphanTimeoutMs: number;
}

/**
 * Runs one user command end to end. The record is written as `processing`
 * before anything else happens, so a crash leaves an audit trail the sweep can
 * later resolve; the caller always gets back a terminal status.
 */
export class CommandExecutor {
  private readonly logger = createLogger({ service: 'CommandExecutor' });

  constructor(
    private readonly classifier: IntentClassifier,
    private readonly registry: CapabilityRegistry,
    private readonly commands: CommandRepository,
    private readonly options: CommandExecutorOptions
  ) {}

  async execute(rawText: string): Promise<CommandOutcome> {
    const record = this.commands.create(rawText.trim(), 'processing');
    const logger = this.logger.child({ method: 'execute', commandId: record.id });
    let intent: Intent | null = null;

    try {
      const classification = await this.classifier.classify(rawText);
      intent = classification.intent;
      this.commands.setIntent(record.id, classification.intent, classification.parameters);
      logger.info({ intent, source: classification.source }, 'Command classified');

      const outcome = await this.registry.invoke(classification.intent, classification.parameters);
      if (outcome.ok) {
        return this.finish(record.id, intent, 'completed', outcome.result.text, outcome.result.data);
      }

      const unavailable = new ProviderUnavailable(classification.intent, outcome.failures);
      logger.warn({ error: unavailable, failures: outcome.failures }, 'Every provider failed');
      return this.finish(record.id, intent, 'failed', describeFailures(outcome.failures));
    } catch (error) {
      // Registry and classifier never reject; this covers storage faults
      logger.error({ error }, 'Command execution failed unexpectedly');
      const detail = error instanceof Error ? error.message : String(error);
      try {
        return this.finish(record.id, intent, 'failed', `internal: ${detail}`);
      } catch (writeError) {
        // The record stays in processing and the orphan sweep will fail it
        logger.error({ error: writeError }, 'Could not record command failure');
        return this.toOutcome(record.id, intent, 'failed', detail, undefined);
      }
    }
  }

  /**
   * Mark records stuck in pending/processing past the orphan timeout as failed.
   * Returns how many were resolved.
   */
  sweepOrphans(now: number = Date.now()): number {
    const logger = this.logger.child({ method: 'sweepOrphans' });
    const stale = this.commands.findStale(now - this.options.orphanTimeoutMs);
    let resolved = 0;

    for (const record of stale) {
      if (this.commands.fail(record.id, ORPHANED_REASON, now)) {
        resolved++;
        logger.warn({ error: new StaleProcessingRecord(record.id, now - record.createdAt) }, 'Orphaned command failed');
      }
    }

    if (resolved > 0) {
      logger.info({ resolved }, 'Orphan sweep finished');
    }
    return resolved;
  }

  private finish(
    commandId: number,
    intent: Intent | null,
    status: TerminalCommandStatus,
    text: string,
    data?: Record<string, unknown>
  ): CommandOutcome {
    const written =
      status === 'completed' ? this.commands.complete(commandId, text) : this.commands.fail(commandId, text);

    if (!written) {
      // Someone else (the orphan sweep) already settled this record; report what is stored
      const stored = this.commands.get(commandId);
      if (stored && isTerminal(stored.status)) {
        this.logger.warn({ commandId, stored: stored.status, attempted: status }, 'Lost status race');
        return this.toOutcome(commandId, intent, stored.status, stored.resultText ?? '', undefined);
      }
    }

    return this.toOutcome(commandId, intent, status, text, data);
  }

  private toOutcome(
    commandId: number,
    intent: Intent | null,
    status: TerminalCommandStatus,
    text: string,
    data: Record<string, unknown> | undefined
  ): CommandOutcome {
    if (status === 'failed') {
      return { commandId, status, success: false, message: GENERIC_FAILURE_MESSAGE, intent };
    }
    return { commandId, status, success: true, message: text, intent, data };
  }
}
