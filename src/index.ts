// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createCredentialResolver } from './config/credentials.js';
import { createLogger } from './utils/logger.js';
import { loadPrompts } from './utils/prompts.js';
import { closeDatabase, getDatabase } from './persistence/database.js';
import { SettingsRepository } from './persistence/repositories/SettingsRepository.js';
import { buildAdapters, createAssistant } from './assistant.js';
import { scheduleOrphanSweep } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting auto-reply assistant');

  try {
    const config = loadConfig();
    const db = getDatabase(config.databasePath);
    const settings = new SettingsRepository(db);
    const prompts = await loadPrompts();

    const adapters = buildAdapters(config, createCredentialResolver(settings, config));
    const assistant = createAssistant(config, db, prompts, adapters);

    if (adapters.telegram) {
      await adapters.telegram.initialize();
    }

    const sweepTask = scheduleOrphanSweep(assistant.executor, config.orphanSweepCron, config.timezone);
    assistant.supervisor.start();

    const server = await startServer(assistant, config.port, config.host);
    logger.info({ host: config.host, port: config.port }, 'Server started successfully');

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      assistant.supervisor.stop();
      sweepTask.stop();
      server.close(() => {
        closeDatabase();
        process.exit(0);
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
