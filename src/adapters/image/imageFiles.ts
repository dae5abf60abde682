import { mkdir, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import path from 'node:path';

export const DEFAULT_IMAGES_DIR = 'data/generated_images';

/** Write image bytes under `dir` with a unique name and return the file path. */
export async function saveImage(dir: string, provider: string, bytes: Uint8Array, extension = 'png'): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `${provider}-${Date.now()}-${randomUUID().slice(0, 8)}.${extension}`);
  await writeFile(filePath, bytes);
  return filePath;
}
