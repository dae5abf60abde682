import type { TextConstraints, TextGenerationPort } from '../../ports/TextGenerationPort.js';
import { ProviderError, classifyProviderError, isTransient } from '../../utils/errors.js';
import { withTimeout } from '../../utils/timeout.js';
import { createLogger } from '../../utils/logger.js';

/**
 * Several text backends behind one port: each is tried in order with its own
 * timeout until one answers with non-empty text.
 */
export class TextChain implements TextGenerationPort {
  readonly name = 'text-chain';
  private readonly logger = createLogger({ service: 'TextChain' });

  constructor(
    private readonly backends: readonly TextGenerationPort[],
    private readonly timeoutMs: number
  ) {}

  get size(): number {
    return this.backends.length;
  }

  async generate(prompt: string, constraints?: TextConstraints): Promise<string> {
    let lastError: ProviderError | undefined;

    for (const backend of this.backends) {
      try {
        const text = (await withTimeout(backend.generate(prompt, constraints), this.timeoutMs, backend.name)).trim();
        if (text) return text;
        lastError = new ProviderError('server', backend.name, 'empty response');
      } catch (error) {
        lastError = classifyProviderError(error, backend.name);
        this.logger.warn({ backend: backend.name, kind: lastError.kind }, 'Text backend failed');
        if (!isTransient(lastError.kind)) break;
      }
    }

    throw lastError ?? new ProviderError('unavailable', this.name, 'no text backend configured');
  }
}
