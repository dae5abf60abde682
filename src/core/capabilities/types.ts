import type { IntentParameters } from '../intent/types.js';
import type { ProviderErrorKind } from '../../utils/errors.js';

export interface CapabilityResult {
  /** Human-readable outcome returned to the command caller */
  text: string;
  data?: Record<string, unknown>;
}

/**
 * One implementation of a capability. New backends are added by implementing this
 * and appending to the registry; `invoke` rejects with a ProviderError.
 */
export interface CapabilityProvider {
  readonly name: string;
  /** Overrides the registry's per-provider timeout, for composites that make several calls */
  readonly timeoutMs?: number;
  invoke(parameters: IntentParameters): Promise<CapabilityResult>;
}

export interface ProviderFailure {
  provider: string;
  kind: ProviderErrorKind;
  message: string;
}

export type ChainOutcome =
  | { ok: true; provider: string; result: CapabilityResult; failures: ProviderFailure[] }
  | { ok: false; failures: ProviderFailure[] };

export function describeFailures(failures: readonly ProviderFailure[]): string {
  return failures.map((failure) => `${failure.provider}: ${failure.kind} (${failure.message})`).join('; ');
}
