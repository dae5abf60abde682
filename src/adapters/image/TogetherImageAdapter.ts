import type { ImageGenerationPort } from '../../ports/ImageGenerationPort.js';
import { createLogger } from '../../utils/logger.js';
import { ImageError, classifyProviderError } from '../../utils/errors.js';
import { DEFAULT_IMAGES_DIR, saveImage } from './imageFiles.js';

export interface TogetherImageOptions {
  apiKey: string;
  model?: string;
  outputDir?: string;
}

interface TogetherImageResponse {
  data?: Array<{ b64_json?: string }>;
}

export class TogetherImageAdapter implements ImageGenerationPort {
  readonly name = 'together';
  private readonly logger = createLogger({ adapter: 'TogetherImageAdapter' });
  private readonly model: string;
  private readonly outputDir: string;

  constructor(private readonly options: TogetherImageOptions) {
    this.model = options.model ?? 'black-forest-labs/FLUX.1-schnell-Free';
    this.outputDir = options.outputDir ?? DEFAULT_IMAGES_DIR;
  }

  async generate(prompt: string): Promise<string> {
    const logger = this.logger.child({ method: 'generate', model: this.model });
    try {
      const response = await fetch('https://api.together.xyz/v1/images/generations', {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          prompt,
          steps: 4,
          n: 1,
          response_format: 'b64_json',
        }),
      });

      if (!response.ok) {
        const text = await response.text();
        throw new ImageError(`Together API error: ${response.status} ${text}`, { status: response.status });
      }

      const data = (await response.json()) as TogetherImageResponse;
      const encoded = data.data?.[0]?.b64_json;
      if (!encoded) {
        throw new ImageError('Together response missing image data', { status: 502 });
      }

      const filePath = await saveImage(this.outputDir, this.name, Buffer.from(encoded, 'base64'));
      logger.info({ filePath }, 'Image generated');
      return filePath;
    } catch (error) {
      logger.error({ error }, 'Image generation failed');
      throw classifyProviderError(error, this.name);
    }
  }
}
