import type { ImageGenerationPort } from '../../ports/ImageGenerationPort.js';
import { createLogger } from '../../utils/logger.js';
import { ImageError, classifyProviderError } from '../../utils/errors.js';
import { DEFAULT_IMAGES_DIR, saveImage } from './imageFiles.js';

export interface HuggingFaceImageOptions {
  apiKey: string;
  model?: string;
  outputDir?: string;
}

export class HuggingFaceImageAdapter implements ImageGenerationPort {
  readonly name = 'huggingface';
  private readonly logger = createLogger({ adapter: 'HuggingFaceImageAdapter' });
  private readonly model: string;
  private readonly outputDir: string;

  constructor(private readonly options: HuggingFaceImageOptions) {
    this.model = options.model ?? 'stabilityai/stable-diffusion-xl-base-1.0';
    this.outputDir = options.outputDir ?? DEFAULT_IMAGES_DIR;
  }

  async generate(prompt: string): Promise<string> {
    const logger = this.logger.child({ method: 'generate', model: this.model });
    try {
      const response = await fetch(`https://api-inference.huggingface.co/models/${this.model}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ inputs: prompt }),
      });

      if (!response.ok) {
        const text = await response.text();
        throw new ImageError(`Hugging Face API error: ${response.status} ${text}`, { status: response.status });
      }

      // The inference API answers 200 with a JSON body while a model is still loading
      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.startsWith('image/')) {
        throw new ImageError(`Hugging Face returned ${contentType || 'no content type'} instead of an image`, {
          status: 503,
        });
      }

      const bytes = new Uint8Array(await response.arrayBuffer());
      const extension = contentType === 'image/jpeg' ? 'jpg' : 'png';
      const filePath = await saveImage(this.outputDir, this.name, bytes, extension);
      logger.info({ filePath, size: bytes.length }, 'Image generated');
      return filePath;
    } catch (error) {
      logger.error({ error }, 'Image generation failed');
      throw classifyProviderError(error, this.name);
    }
  }
}
