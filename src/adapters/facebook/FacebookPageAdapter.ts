import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { SocialPostPort } from '../../ports/SocialPostPort.js';
import { createLogger } from '../../utils/logger.js';
import { SocialError, classifyProviderError } from '../../utils/errors.js';
import { graphRequest, type FacebookCredentials } from './graphClient.js';

interface PublishResponse {
  id?: string;
  post_id?: string;
}

export class FacebookPageAdapter implements SocialPostPort {
  readonly platform = 'facebook';
  private readonly logger = createLogger({ adapter: 'FacebookPageAdapter' });

  constructor(private readonly credentials: FacebookCredentials) {}

  async publish(content: string, imageReference?: string): Promise<string> {
    const logger = this.logger.child({ method: 'publish', withImage: Boolean(imageReference) });
    try {
      const result = imageReference
        ? await this.publishPhoto(content, imageReference)
        : await this.publishText(content);

      const postId = result.post_id ?? result.id;
      if (!postId) {
        throw new SocialError('Graph API response missing post id', { status: 502 });
      }
      logger.info({ postId }, 'Post published');
      return postId;
    } catch (error) {
      logger.error({ error }, 'Failed to publish post');
      throw classifyProviderError(error, this.platform);
    }
  }

  private publishText(message: string): Promise<PublishResponse> {
    return graphRequest<PublishResponse>(`${this.credentials.pageId}/feed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ message, access_token: this.credentials.accessToken }),
    });
  }

  private async publishPhoto(caption: string, imagePath: string): Promise<PublishResponse> {
    const bytes = await readFile(imagePath);
    const form = new FormData();
    form.append('caption', caption);
    form.append('access_token', this.credentials.accessToken);
    form.append('source', new Blob([new Uint8Array(bytes)]), path.basename(imagePath));

    return graphRequest<PublishResponse>(`${this.credentials.pageId}/photos`, {
      method: 'POST',
      body: form,
    });
  }
}
