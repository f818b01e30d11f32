import fs from 'fs';
import { fileURLToPath } from 'url';

export const DEFAULT_PROMPT_PATH = fileURLToPath(new URL('../../prompts/system_prompt.md', import.meta.url));

/**
 * Read the analyst system prompt shipped in `prompts/`.
 */
export function loadSystemPrompt(file: string = DEFAULT_PROMPT_PATH): string {
  return fs.readFileSync(file, 'utf8').trim();
}
