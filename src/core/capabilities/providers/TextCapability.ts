import type { TextGenerationPort } from '../../../ports/TextGenerationPort.js';
import type { IntentParameters } from '../../intent/types.js';
import type { CapabilityProvider, CapabilityResult } from '../types.js';
import { ProviderError } from '../../../utils/errors.js';
import { fillTemplate } from '../../../utils/prompts.js';

const ASSISTANT_SYSTEM_PROMPT =
  'You are a concise personal assistant. Answer in plain sentences suitable for being read aloud.';

/** What `text_generation` can write, with a one-line description of each. */
export const CONTENT_TYPES = {
  blog_article: 'A structured article with an introduction, headed sections and a conclusion',
  creative_story: 'A short piece of fiction with a clear beginning, middle and end',
  review: 'An honest review weighing strengths and weaknesses',
  tutorial: 'Step-by-step instructions a beginner can follow',
  product_description: 'Persuasive copy for a product listing',
  news_article: 'A factual report written in news style',
  email_reply: 'A polite, professional reply to an email',
  social_post: 'A short, engaging post for social media',
} as const;

export type ContentType = keyof typeof CONTENT_TYPES;

export function isContentType(value: string): value is ContentType {
  return Object.hasOwn(CONTENT_TYPES, value);
}

function required(parameters: IntentParameters, key: string, provider: string): string {
  const value = parameters[key]?.trim();
  if (!value) {
    throw new ProviderError('bad_input', provider, `missing parameter "${key}"`);
  }
  return value;
}

function nonEmpty(text: string, provider: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ProviderError('server', provider, 'empty response');
  }
  return trimmed;
}

/** Answers a free-form question with one text backend. */
export class GeneralQueryCapability implements CapabilityProvider {
  readonly name: string;

  constructor(private readonly backend: TextGenerationPort) {
    this.name = backend.name;
  }

  async invoke(parameters: IntentParameters): Promise<CapabilityResult> {
    const query = required(parameters, 'query', this.name);
    const text = await this.backend.generate(query, { systemPrompt: ASSISTANT_SYSTEM_PROMPT, maxTokens: 600 });
    return { text: nonEmpty(text, this.name) };
  }
}

/** Writes a piece of content (article, story, caption...) on a topic. */
export class TextContentCapability implements CapabilityProvider {
  readonly name: string;

  constructor(
    private readonly backend: TextGenerationPort,
    private readonly promptTemplate: string
  ) {
    this.name = backend.name;
  }

  async invoke(parameters: IntentParameters): Promise<CapabilityResult> {
    const topic = required(parameters, 'topic', this.name);
    const contentType = parameters.contentType?.trim() || 'social_post';
    if (!isContentType(contentType)) {
      throw new ProviderError('bad_input', this.name, `unsupported content type "${contentType}"`);
    }
    const language = parameters.language ?? 'english';
    const prompt = fillTemplate(this.promptTemplate, {
      CONTENT_TYPE: contentType.replace(/_/g, ' '),
      TOPIC: topic,
      LANGUAGE: language,
    });
    const text = nonEmpty(await this.backend.generate(prompt, { maxTokens: 1200, temperature: 0.7 }), this.name);
    return { text, data: { contentType, topic, language } };
  }
}

/** Drafts an auto-reply to an inbound message. */
export class ReplyCapability implements CapabilityProvider {
  readonly name: string;

  constructor(
    private readonly backend: TextGenerationPort,
    private readonly promptTemplate: string
  ) {
    this.name = backend.name;
  }

  async invoke(parameters: IntentParameters): Promise<CapabilityResult> {
    const body = required(parameters, 'body', this.name);
    const prompt = fillTemplate(this.promptTemplate, {
      BODY: body,
      SENDER: parameters.sender ?? 'someone',
      CHANNEL: parameters.channel ?? 'message',
    });
    const text = await this.backend.generate(prompt, { maxTokens: 300, temperature: 0.5 });
    return { text: nonEmpty(text, this.name) };
  }
}
