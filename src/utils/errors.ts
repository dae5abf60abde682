export class AssistantError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AssistantError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Adapter failures carry the upstream HTTP status, when there was one, for classifyProviderError. */
export class AdapterError extends AssistantError {
  public readonly status?: number;

  constructor(adapter: string, message: string, options?: ErrorOptions & { status?: number }) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
    this.status = options?.status;
  }
}

export class LLMError extends AdapterError {
  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super('LLM', message, options);
    this.name = 'LLMError';
  }
}

export class ImageError extends AdapterError {
  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super('IMAGE', message, options);
    this.name = 'ImageError';
  }
}

export class SocialError extends AdapterError {
  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super('SOCIAL', message, options);
    this.name = 'SocialError';
  }
}

export class ChannelError extends AdapterError {
  constructor(channel: string, message: string, options?: ErrorOptions & { status?: number }) {
    super(`CHANNEL_${channel}`, message, options);
    this.name = 'ChannelError';
  }
}

export class ConfigError extends AssistantError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

/** Failure kinds a capability provider can report. */
export type ProviderErrorKind =
  | 'timeout'
  | 'rate_limit'
  | 'server'
  | 'network'
  | 'unavailable'
  | 'bad_input'
  | 'unknown';

/** Only bad input stops a fallback chain; anything else may succeed on the next provider. */
export function isTransient(kind: ProviderErrorKind): boolean {
  return kind !== 'bad_input';
}

export class ProviderError extends AssistantError {
  public readonly kind: ProviderErrorKind;
  public readonly provider: string;

  constructor(kind: ProviderErrorKind, provider: string, message: string, options?: ErrorOptions) {
    super(message, `PROVIDER_${kind.toUpperCase()}`, options);
    this.name = 'ProviderError';
    this.kind = kind;
    this.provider = provider;
  }
}

/** Raised by withTimeout when a bounded call does not settle in time. */
export class TimeoutError extends AssistantError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class ClassificationTimeout extends AssistantError {
  constructor(timeoutMs: number, options?: ErrorOptions) {
    super(`Intent classification timed out after ${timeoutMs}ms`, 'CLASSIFICATION_TIMEOUT', options);
    this.name = 'ClassificationTimeout';
  }
}

export class ProviderUnavailable extends AssistantError {
  public readonly failures: ReadonlyArray<{ provider: string; kind: ProviderErrorKind; message: string }>;

  constructor(
    intent: string,
    failures: ReadonlyArray<{ provider: string; kind: ProviderErrorKind; message: string }>
  ) {
    super(`No provider could handle ${intent}`, 'PROVIDER_UNAVAILABLE');
    this.name = 'ProviderUnavailable';
    this.failures = failures;
  }
}

export class SendFailure extends AssistantError {
  constructor(channel: string, externalId: string, options?: ErrorOptions) {
    super(`Failed to send reply on ${channel} for ${externalId}`, 'SEND_FAILURE', options);
    this.name = 'SendFailure';
  }
}

export class StaleProcessingRecord extends AssistantError {
  constructor(commandId: number, ageMs: number) {
    super(`Command ${commandId} stuck in processing for ${ageMs}ms`, 'STALE_PROCESSING_RECORD');
    this.name = 'StaleProcessingRecord';
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function kindFromStatus(status: number): ProviderErrorKind | undefined {
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status === 401 || status === 403) return 'unavailable';
  if (status >= 500) return 'server';
  if (status >= 400) return 'bad_input';
  return undefined;
}

/** Map any thrown value to a ProviderError, using HTTP status first and message text second. */
export function classifyProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) return error;
  if (error instanceof TimeoutError) {
    return new ProviderError('timeout', provider, error.message, { cause: error });
  }

  const candidates = [error, error instanceof Error ? error.cause : undefined];
  for (const candidate of candidates) {
    const status = statusOf(candidate);
    const kind = status === undefined ? undefined : kindFromStatus(status);
    if (kind) {
      return new ProviderError(kind, provider, `HTTP ${status}`, { cause: error });
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  const text = message.toLowerCase();
  let kind: ProviderErrorKind = 'unknown';
  if (/rate limit|too many requests|quota/.test(text)) kind = 'rate_limit';
  else if (/timeout|timed out|etimedout|aborted/.test(text)) kind = 'timeout';
  else if (/econnrefused|econnreset|enotfound|network|fetch failed/.test(text)) kind = 'network';

  return new ProviderError(kind, provider, message, { cause: error });
}
