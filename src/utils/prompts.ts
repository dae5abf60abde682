import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const promptsDir = join(__dirname, '../prompts');

export type PromptName = 'classify_intent.md' | 'auto_reply.md' | 'social_post.md' | 'text_content.md';

export async function loadPrompt(name: PromptName): Promise<string> {
  const filePath = join(promptsDir, name);
  return readFile(filePath, 'utf8');
}

export async function loadPrompts(): Promise<Record<PromptName, string>> {
  const [classify, reply, social, text] = await Promise.all([
    loadPrompt('classify_intent.md'),
    loadPrompt('auto_reply.md'),
    loadPrompt('social_post.md'),
    loadPrompt('text_content.md'),
  ]);
  return {
    'classify_intent.md': classify,
    'auto_reply.md': reply,
    'social_post.md': social,
    'text_content.md': text,
  };
}

/** Replace every `{{KEY}}` placeholder; unknown placeholders are left as-is. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => values[key] ?? match);
}
