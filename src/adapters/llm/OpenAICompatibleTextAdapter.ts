import type { TextConstraints, TextGenerationPort } from '../../ports/TextGenerationPort.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { LLMError, classifyProviderError } from '../../utils/errors.js';

export interface OpenAICompatibleOptions {
  /** Provider name used in logs and failure reports, e.g. `openrouter` */
  name: string;
  baseUrl: string;
  apiKey: string;
  model: string;
  extraHeaders?: Record<string, string>;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

export const OPENROUTER_DEFAULTS = {
  name: 'openrouter',
  baseUrl: 'https://openrouter.ai/api/v1',
  model: 'deepseek/deepseek-r1-distill-llama-70b:free',
} as const;

export const DEEPSEEK_DEFAULTS = {
  name: 'deepseek',
  baseUrl: 'https://api.deepseek.com/v1',
  model: 'deepseek-chat',
} as const;

/** Text backend for any provider that speaks the chat/completions wire format. */
export class OpenAICompatibleTextAdapter implements TextGenerationPort {
  readonly name: string;
  private readonly logger: Logger;

  constructor(private readonly options: OpenAICompatibleOptions) {
    this.name = options.name;
    this.logger = createLogger({ adapter: 'OpenAICompatibleTextAdapter', provider: options.name });
  }

  async generate(prompt: string, constraints: TextConstraints = {}): Promise<string> {
    const logger = this.logger.child({ method: 'generate' });
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (constraints.systemPrompt?.trim()) {
      messages.push({ role: 'system', content: constraints.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    try {
      const response = await fetch(`${this.options.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
          ...this.options.extraHeaders,
        },
        body: JSON.stringify({
          model: this.options.model,
          messages,
          max_tokens: constraints.maxTokens ?? 800,
          temperature: constraints.temperature ?? 0.7,
        }),
      });

      if (!response.ok) {
        const text = await response.text();
        throw new LLMError(`${this.name} API error: ${response.status} ${text}`, { status: response.status });
      }

      const data = (await response.json()) as ChatCompletionResponse;
      const content = data.choices?.[0]?.message?.content?.trim() ?? '';
      if (!content) {
        throw new LLMError(`${this.name} returned an empty completion`, { status: 502 });
      }
      return content;
    } catch (error) {
      logger.error({ error }, 'Text generation failed');
      throw classifyProviderError(error, this.name);
    }
  }
}
