import type { SocialPostPort } from '../../../ports/SocialPostPort.js';
import type { TextGenerationPort } from '../../../ports/TextGenerationPort.js';
import type { SocialPostRepository } from '../../../persistence/repositories/SocialPostRepository.js';
import type { IntentParameters } from '../../intent/types.js';
import type { CapabilityProvider, CapabilityResult } from '../types.js';
import type { CapabilityRegistry } from '../CapabilityRegistry.js';
import { ProviderError, classifyProviderError } from '../../../utils/errors.js';
import { fillTemplate } from '../../../utils/prompts.js';
import { withTimeout } from '../../../utils/timeout.js';
import { createLogger } from '../../../utils/logger.js';

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['true', 'yes', '1'].includes(value.toLowerCase());
}

/**
 * Writes a post with the text chain, optionally illustrates it through the
 * `create_image` chain (falling back to a text-only post), publishes it, and
 * records the outcome in the ledger.
 *
 * With a `timeoutMs`, every step runs inside one deadline and nothing is
 * published once it has passed, so a post never goes out for a command the
 * registry already gave up on.
 */
export class SocialPostCapability implements CapabilityProvider {
  readonly name: string;
  readonly timeoutMs?: number;
  private readonly logger = createLogger({ service: 'SocialPostCapability' });

  constructor(
    private readonly writer: TextGenerationPort,
    private readonly registry: CapabilityRegistry,
    private readonly publisher: SocialPostPort,
    private readonly posts: SocialPostRepository,
    private readonly promptTemplate: string,
    timeoutMs?: number
  ) {
    this.name = publisher.platform;
    this.timeoutMs = timeoutMs;
  }

  async invoke(parameters: IntentParameters): Promise<CapabilityResult> {
    const logger = this.logger.child({ method: 'invoke' });
    const topic = parameters.topic?.trim();
    if (!topic) {
      throw new ProviderError('bad_input', this.name, 'missing parameter "topic"');
    }

    const deadline = this.timeoutMs === undefined ? undefined : Date.now() + this.timeoutMs;

    const content = await this.withinDeadline(
      this.writer.generate(fillTemplate(this.promptTemplate, { TOPIC: topic }), {
        maxTokens: 400,
        temperature: 0.8,
      }),
      deadline,
      'post writing'
    );

    let imageReference: string | undefined;
    if (isTruthy(parameters.includeImage)) {
      const image = await this.registry.invoke(
        'create_image',
        { prompt: `An image for a post about ${topic}` },
        deadline === undefined ? undefined : { timeoutMs: Math.max(deadline - Date.now(), 1) }
      );
      const reference = image.ok ? image.result.data?.imageReference : undefined;
      if (typeof reference === 'string') {
        imageReference = reference;
      } else {
        logger.warn({ topic }, 'Image generation failed; publishing text-only post');
      }
    }

    if (deadline !== undefined && Date.now() >= deadline) {
      logger.warn({ topic, timeoutMs: this.timeoutMs }, 'Deadline passed before publishing');
      throw new ProviderError('timeout', this.name, `deadline of ${this.timeoutMs}ms passed before publishing`);
    }

    try {
      const platformPostId = await this.publisher.publish(content, imageReference);
      this.posts.append({ platform: this.publisher.platform, topic, content, imageReference, platformPostId, status: 'posted' });
      logger.info({ platformPostId, withImage: imageReference !== undefined }, 'Social post published');
      return {
        text: imageReference
          ? `Posted about ${topic} with an AI-generated image.`
          : `Posted about ${topic}.`,
        data: { platformPostId, content, imageReference },
      };
    } catch (error) {
      this.posts.append({ platform: this.publisher.platform, topic, content, imageReference, status: 'failed' });
      throw classifyProviderError(error, this.name);
    }
  }

  private async withinDeadline<T>(work: Promise<T>, deadline: number | undefined, label: string): Promise<T> {
    if (deadline === undefined) {
      return work;
    }
    return withTimeout(work, Math.max(deadline - Date.now(), 1), label);
  }
}
