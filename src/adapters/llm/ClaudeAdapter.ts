import Anthropic from '@anthropic-ai/sdk';
import type { TextConstraints, TextGenerationPort } from '../../ports/TextGenerationPort.js';
import { createLogger } from '../../utils/logger.js';
import { ProviderError, classifyProviderError } from '../../utils/errors.js';

export interface ClaudeAdapterOptions {
  apiKey: string;
  model?: string;
}

/** System prompt as a single cached text block. */
function buildSystemParam(
  systemPrompt: string | undefined
): Array<{ type: 'text'; text: string; cache_control: { type: 'ephemeral' } }> | undefined {
  if (!systemPrompt?.trim()) {
    return undefined;
  }
  return [
    {
      type: 'text',
      text: systemPrompt,
      cache_control: { type: 'ephemeral' },
    },
  ];
}

export class ClaudeAdapter implements TextGenerationPort {
  readonly name = 'claude';
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(options: ClaudeAdapterOptions, client?: Anthropic) {
    this.client = client ?? new Anthropic({ apiKey: options.apiKey });
    this.model = options.model ?? 'claude-sonnet-4-5';
    this.logger.info({ model: this.model }, 'Claude adapter initialized');
  }

  async generate(prompt: string, constraints: TextConstraints = {}): Promise<string> {
    const logger = this.logger.child({ method: 'generate' });
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: constraints.maxTokens ?? 800,
        temperature: constraints.temperature ?? 0.7,
        system: buildSystemParam(constraints.systemPrompt),
        messages: [{ role: 'user', content: prompt }],
      });

      const text = extractText(response);
      if (!text) {
        throw new ProviderError('server', this.name, 'Claude returned no text content');
      }
      return text;
    } catch (error) {
      logger.error({ error }, 'Claude text generation failed');
      throw classifyProviderError(error, this.name);
    }
  }
}

function extractText(response: Anthropic.Message): string {
  for (const block of response.content) {
    if (block.type === 'text') {
      return block.text.trim();
    }
  }
  return '';
}
