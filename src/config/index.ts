import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const configSchema = z.object({
  // Text generation
  anthropicApiKey: z.string().min(1).optional(),
  llmTextModel: z.string().optional(),
  openRouterApiKey: z.string().optional(),
  openRouterModel: z.string().optional(),
  deepSeekApiKey: z.string().optional(),
  deepSeekModel: z.string().optional(),

  // Image generation
  huggingFaceApiKey: z.string().optional(),
  huggingFaceImageModel: z.string().optional(),
  togetherApiKey: z.string().optional(),
  togetherImageModel: z.string().optional(),
  generatedImagesDir: z.string().optional(),

  // Facebook page
  facebookPageId: z.string().optional(),
  facebookAccessToken: z.string().optional(),

  // Gmail
  gmailClientId: z.string().optional(),
  gmailClientSecret: z.string().optional(),
  gmailRefreshToken: z.string().optional(),
  gmailUserId: z.string().optional(),

  // Telegram
  telegramBotToken: z.string().optional(),
  telegramWebhookUrl: z.string().url().optional(), // Optional: if not set, the chat channel is polled

  // Poller and executor tuning
  pollBaseIntervalMs: z.coerce.number().int().positive().default(5 * 60 * 1000),
  pollMaxIntervalMs: z.coerce.number().int().positive().default(40 * 60 * 1000),
  replyMaxAttempts: z.coerce.number().int().min(1).default(3),
  cycleDeadlineMs: z.coerce.number().int().positive().default(2 * 60 * 1000),
  providerTimeoutMs: z.coerce.number().int().positive().default(30_000),
  classifyTimeoutMs: z.coerce.number().int().positive().default(8_000),
  orphanTimeoutMs: z.coerce.number().int().positive().default(10 * 60 * 1000),
  orphanSweepCron: z.string().default('* * * * *'),
  reservationLeaseMs: z.coerce.number().int().positive().default(10 * 60 * 1000),

  // App
  // Cron schedules and the "today" counts in status reports; LOG_LEVEL is read by the logger itself
  timezone: z.string().refine(isTimeZone, 'Unknown time zone').default('UTC'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
  databasePath: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(raw: Record<string, unknown>): Config {
  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  return parseConfig({
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmTextModel: env('LLM_TEXT_MODEL'),
    openRouterApiKey: env('OPENROUTER_API_KEY'),
    openRouterModel: env('OPENROUTER_MODEL'),
    deepSeekApiKey: env('DEEPSEEK_API_KEY'),
    deepSeekModel: env('DEEPSEEK_MODEL'),
    huggingFaceApiKey: env('HUGGINGFACE_API_KEY'),
    huggingFaceImageModel: env('HUGGINGFACE_IMAGE_MODEL'),
    togetherApiKey: env('TOGETHER_API_KEY'),
    togetherImageModel: env('TOGETHER_IMAGE_MODEL'),
    generatedImagesDir: env('GENERATED_IMAGES_DIR'),
    facebookPageId: env('FACEBOOK_PAGE_ID'),
    facebookAccessToken: env('FACEBOOK_ACCESS_TOKEN'),
    gmailClientId: env('GMAIL_CLIENT_ID'),
    gmailClientSecret: env('GMAIL_CLIENT_SECRET'),
    gmailRefreshToken: env('GMAIL_REFRESH_TOKEN'),
    gmailUserId: env('GMAIL_USER_ID'),
    telegramBotToken: env('TELEGRAM_BOT_TOKEN'),
    telegramWebhookUrl: env('TELEGRAM_WEBHOOK_URL'),
    pollBaseIntervalMs: env('POLL_BASE_INTERVAL_MS'),
    pollMaxIntervalMs: env('POLL_MAX_INTERVAL_MS'),
    replyMaxAttempts: env('REPLY_MAX_ATTEMPTS'),
    cycleDeadlineMs: env('CYCLE_DEADLINE_MS'),
    providerTimeoutMs: env('PROVIDER_TIMEOUT_MS'),
    classifyTimeoutMs: env('CLASSIFY_TIMEOUT_MS'),
    orphanTimeoutMs: env('ORPHAN_TIMEOUT_MS'),
    orphanSweepCron: env('ORPHAN_SWEEP_CRON'),
    reservationLeaseMs: env('RESERVATION_LEASE_MS'),
    timezone: env('TIMEZONE'),
    host: env('HOST'),
    port: env('PORT'),
    databasePath: env('DATABASE_PATH'),
  });
}
