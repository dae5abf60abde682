import type { Intent, IntentParameters } from '../intent/types.js';
import type { CapabilityProvider, ChainOutcome, ProviderFailure } from './types.js';
import { classifyProviderError, isTransient } from '../../utils/errors.js';
import { withTimeout } from '../../utils/timeout.js';
import { createLogger } from '../../utils/logger.js';

export interface InvokeOptions {
  timeoutMs: number;
}

/** Intent -> ordered provider list (primary first, then fallbacks). */
export class CapabilityRegistry {
  private readonly logger = createLogger({ service: 'CapabilityRegistry' });
  private readonly providers = new Map<Intent, CapabilityProvider[]>();

  constructor(private readonly defaults: InvokeOptions) {}

  register(intent: Intent, provider: CapabilityProvider): this {
    const list = this.providers.get(intent) ?? [];
    list.push(provider);
    this.providers.set(intent, list);
    return this;
  }

  providersFor(intent: Intent): readonly CapabilityProvider[] {
    return this.providers.get(intent) ?? [];
  }

  describe(): Record<string, string[]> {
    const description: Record<string, string[]> = {};
    for (const [intent, list] of this.providers) {
      description[intent] = list.map((provider) => provider.name);
    }
    return description;
  }

  /**
   * Run the chain for `intent`. Transient failures move on to the next provider;
   * bad input stops the chain. Never rejects.
   */
  async invoke(intent: Intent, parameters: IntentParameters, options?: Partial<InvokeOptions>): Promise<ChainOutcome> {
    const logger = this.logger.child({ method: 'invoke', intent });
    const chain = this.providersFor(intent);
    const failures: ProviderFailure[] = [];

    if (chain.length === 0) {
      logger.warn('No providers registered for intent');
      return {
        ok: false,
        failures: [{ provider: 'registry', kind: 'unavailable', message: `no provider configured for ${intent}` }],
      };
    }

    for (const provider of chain) {
      const timeoutMs = options?.timeoutMs ?? provider.timeoutMs ?? this.defaults.timeoutMs;
      try {
        const result = await withTimeout(provider.invoke(parameters), timeoutMs, provider.name);
        if (failures.length > 0) {
          logger.info({ provider: provider.name, skipped: failures.length }, 'Fallback provider succeeded');
        }
        return { ok: true, provider: provider.name, result, failures };
      } catch (error) {
        const classified = classifyProviderError(error, provider.name);
        failures.push({ provider: provider.name, kind: classified.kind, message: classified.message });
        logger.warn({ provider: provider.name, kind: classified.kind, error }, 'Provider failed');
        if (!isTransient(classified.kind)) {
          break;
        }
      }
    }

    return { ok: false, failures };
  }
}
