import { describe, it, expect } from 'vitest';
import { loadConfig, parseConfig } from '../../config/index.js';
import { createCredentialResolver } from '../../config/credentials.js';
import { openDatabase } from '../../persistence/database.js';
import { SettingsRepository } from '../../persistence/repositories/SettingsRepository.js';
import { ConfigError } from '../../utils/errors.js';

describe('config', () => {
  it('fills in the tuning defaults', () => {
    expect(parseConfig({})).toMatchObject({
      pollBaseIntervalMs: 300_000,
      pollMaxIntervalMs: 2_400_000,
      replyMaxAttempts: 3,
      cycleDeadlineMs: 120_000,
      providerTimeoutMs: 30_000,
      classifyTimeoutMs: 8_000,
      orphanTimeoutMs: 600_000,
      orphanSweepCron: '* * * * *',
      reservationLeaseMs: 600_000,
      port: 5000,
      timezone: 'UTC',
    });
  });

  it('leaves the log level to the logger', () => {
    expect(loadConfig({ LOG_LEVEL: 'debug' })).not.toHaveProperty('logLevel');
  });

  it('reads the environment and treats empty values as unset', () => {
    const config = loadConfig({ POLL_BASE_INTERVAL_MS: '60000', ANTHROPIC_API_KEY: '', TELEGRAM_BOT_TOKEN: 'test-token' });

    expect(config.pollBaseIntervalMs).toBe(60_000);
    expect(config.anthropicApiKey).toBeUndefined();
    expect(config.telegramBotToken).toBe('test-token');
  });

  it('names every invalid field', () => {
    expect(() => loadConfig({ PORT: 'eighty', TELEGRAM_WEBHOOK_URL: 'not a url' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/port: Expected number, received nan/);
    expect(() => loadConfig({ TIMEZONE: 'Mars/Olympus_Mons' })).toThrow(/timezone: Unknown time zone/);
  });
});

describe('createCredentialResolver', () => {
  it('prefers a stored setting over the environment', () => {
    const db = openDatabase(':memory:');
    db.prepare('INSERT INTO settings (key, value) VALUES (?, ?), (?, ?)').run(
      'TOGETHER_API_KEY',
      'test-setting-key',
      'DEEPSEEK_API_KEY',
      ''
    );
    const config = parseConfig({ togetherApiKey: 'test-env-key', deepSeekApiKey: 'test-deepseek' });

    const credential = createCredentialResolver(new SettingsRepository(db), config);

    expect(credential('TOGETHER_API_KEY')).toBe('test-setting-key');
    expect(credential('DEEPSEEK_API_KEY')).toBe('test-deepseek');
    expect(credential('GMAIL_CLIENT_ID')).toBeUndefined();
  });
});
