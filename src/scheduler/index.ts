import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import type { CommandExecutor } from '../core/commands/CommandExecutor.js';

const logger = createLogger({ component: 'scheduler' });

/** Fail stale `processing` commands once now and then on `cronExpression`. */
export function scheduleOrphanSweep(executor: CommandExecutor, cronExpression: string, timezone: string): ScheduledTask {
  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid ORPHAN_SWEEP_CRON expression: ${cronExpression}`);
  }

  const sweep = (trigger: 'startup' | 'cron'): void => {
    try {
      const resolved = executor.sweepOrphans();
      logger.debug({ trigger, resolved }, 'Orphan sweep ran');
    } catch (error) {
      logger.error({ error, trigger }, 'Orphan sweep failed');
    }
  };

  sweep('startup');
  logger.info({ cronExpression, timezone }, 'Scheduling orphan sweep');
  return cron.schedule(cronExpression, () => sweep('cron'), { timezone });
}
