import type { SettingsPort } from '../ports/SettingsPort.js';
import type { Config } from './index.js';

/** Settings keys that may override a credential from the environment. */
export const CREDENTIAL_KEYS = {
  ANTHROPIC_API_KEY: 'anthropicApiKey',
  OPENROUTER_API_KEY: 'openRouterApiKey',
  DEEPSEEK_API_KEY: 'deepSeekApiKey',
  HUGGINGFACE_API_KEY: 'huggingFaceApiKey',
  TOGETHER_API_KEY: 'togetherApiKey',
  FACEBOOK_PAGE_ID: 'facebookPageId',
  FACEBOOK_ACCESS_TOKEN: 'facebookAccessToken',
  GMAIL_CLIENT_ID: 'gmailClientId',
  GMAIL_CLIENT_SECRET: 'gmailClientSecret',
  GMAIL_REFRESH_TOKEN: 'gmailRefreshToken',
  TELEGRAM_BOT_TOKEN: 'telegramBotToken',
} as const satisfies Record<string, keyof Config>;

export type CredentialKey = keyof typeof CREDENTIAL_KEYS;

export type CredentialResolver = (key: CredentialKey) => string | undefined;

/** Setting first, environment second. `undefined` means the credential is not configured. */
export function createCredentialResolver(settings: SettingsPort, config: Config): CredentialResolver {
  return (key) => settings.get(key) ?? config[CREDENTIAL_KEYS[key]];
}
