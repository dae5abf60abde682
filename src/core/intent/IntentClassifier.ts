import { z } from 'zod';
import type { TextGenerationPort } from '../../ports/TextGenerationPort.js';
import type { InboundMessage } from '../../ports/ChannelPort.js';
import { COMMAND_INTENTS } from './types.js';
import type { Intent, IntentClassification, IntentParameters } from './types.js';
import { createLogger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/timeout.js';
import { ClassificationTimeout, TimeoutError } from '../../utils/errors.js';
import { fillTemplate } from '../../utils/prompts.js';

interface PatternRule {
  intent: Intent;
  patterns: RegExp[];
}

// Checked in order; first hit wins
const PATTERN_RULES: PatternRule[] = [
  {
    intent: 'help',
    patterns: [/^help( me)?$/, /\bwhat can you do\b/, /^(list )?commands$/],
  },
  {
    intent: 'voice_test',
    patterns: [/\bvoice test\b/, /\btest (the |your )?(voice|speech|speaker)\b/, /\bcan you hear me\b/],
  },
  {
    intent: 'auto_reply_status',
    patterns: [/\bauto ?repl(y|ies) status\b/, /\bany (new )?repl(y|ies)\b/],
  },
  {
    intent: 'system_status',
    patterns: [/^(system )?status( check)?$/, /\bhow are you\b/, /\bare you (working|there|ok|okay)\b/, /^system (check|health)$/],
  },
];

const guessSchema = z.object({
  intent: z.enum(COMMAND_INTENTS),
  parameters: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

export interface IntentClassifierOptions {
  timeoutMs: number;
}

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, ' ')
    .replace(/-/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function matchPattern(rawText: string): Intent | null {
  const text = normalize(rawText);
  for (const rule of PATTERN_RULES) {
    if (rule.patterns.some((pattern) => pattern.test(text))) {
      return rule.intent;
    }
  }
  return null;
}

function withDefaults(intent: Intent, parameters: IntentParameters, rawText: string): IntentParameters {
  switch (intent) {
    case 'general_query':
      return { query: rawText, ...parameters };
    case 'create_image':
      return { prompt: rawText, ...parameters };
    case 'social_post':
      return { topic: rawText, includeImage: 'false', ...parameters };
    case 'text_generation':
      return { contentType: 'social_post', topic: rawText, language: 'english', ...parameters };
    default:
      return parameters;
  }
}

/**
 * Turns a command into an intent. Fixed phrases are matched locally; anything else
 * goes to the text model with a bounded wait, and every failure ends in
 * `general_query` so the command can still be answered.
 */
export class IntentClassifier {
  private readonly logger = createLogger({ service: 'IntentClassifier' });

  constructor(
    private readonly textGenerator: TextGenerationPort,
    private readonly promptTemplate: string,
    private readonly options: IntentClassifierOptions
  ) {}

  async classify(rawText: string): Promise<IntentClassification> {
    const text = rawText.trim();
    const patternIntent = matchPattern(text);
    if (patternIntent) {
      return { intent: patternIntent, parameters: {}, source: 'pattern' };
    }

    const logger = this.logger.child({ method: 'classify' });
    try {
      const raw = await withTimeout(
        this.textGenerator.generate(fillTemplate(this.promptTemplate, { COMMAND: text }), {
          maxTokens: 200,
          temperature: 0,
        }),
        this.options.timeoutMs,
        'intent classification'
      );
      const guess = this.parseGuess(raw);
      if (guess) {
        logger.info({ intent: guess.intent }, 'Model classified command');
        return {
          intent: guess.intent,
          parameters: withDefaults(guess.intent, guess.parameters, text),
          source: 'model',
        };
      }
      logger.warn({ raw: raw.slice(0, 200) }, 'Unparseable classification, using fallback intent');
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.warn({ error: new ClassificationTimeout(this.options.timeoutMs, { cause: error }) }, 'Classification timed out');
      } else {
        logger.warn({ error }, 'Classification failed, using fallback intent');
      }
    }

    return { intent: 'general_query', parameters: { query: text }, source: 'fallback' };
  }

  /** Inbound messages always map to a reply; no model call is needed to know that. */
  forInboundMessage(message: InboundMessage): IntentClassification {
    return {
      intent: 'reply_generation',
      parameters: {
        body: message.body,
        sender: message.sender,
        channel: message.channel,
      },
      source: 'pattern',
    };
  }

  private parseGuess(raw: string): { intent: Intent; parameters: IntentParameters } | null {
    const jsonMatch = raw.match(/\{[\s\S]*\}/);
    if (!jsonMatch) return null;

    let candidate: unknown;
    try {
      candidate = JSON.parse(jsonMatch[0]);
    } catch {
      return null;
    }

    const parsed = guessSchema.safeParse(candidate);
    if (!parsed.success) return null;

    const parameters: IntentParameters = {};
    for (const [key, value] of Object.entries(parsed.data.parameters ?? {})) {
      const asString = String(value).trim();
      if (asString) parameters[key] = asString;
    }
    return { intent: parsed.data.intent, parameters };
  }
}
