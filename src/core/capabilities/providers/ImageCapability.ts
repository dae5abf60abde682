import type { ImageGenerationPort } from '../../../ports/ImageGenerationPort.js';
import type { IntentParameters } from '../../intent/types.js';
import type { CapabilityProvider, CapabilityResult } from '../types.js';
import { ProviderError } from '../../../utils/errors.js';

export class ImageCapability implements CapabilityProvider {
  readonly name: string;

  constructor(private readonly backend: ImageGenerationPort) {
    this.name = backend.name;
  }

  async invoke(parameters: IntentParameters): Promise<CapabilityResult> {
    const prompt = parameters.prompt?.trim();
    if (!prompt) {
      throw new ProviderError('bad_input', this.name, 'missing parameter "prompt"');
    }
    const imageReference = await this.backend.generate(prompt);
    return {
      text: `Here is your image of ${prompt}.`,
      data: { imageReference, prompt },
    };
  }
}
