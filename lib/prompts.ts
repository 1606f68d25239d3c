import { readFileSync } from 'node:fs';
import { join } from 'node:path';

const cache = new Map<string, string>();

function promptsDir(): string {
  return process.env.TUTOR_PROMPTS_DIR || join(process.cwd(), 'prompts');
}

export function loadPrompt(name: string): string {
  const full = join(promptsDir(), name);
  const cached = cache.get(full);
  if (cached !== undefined) {
    return cached;
  }
  const text = readFileSync(full, 'utf-8').trim();
  cache.set(full, text);
  return text;
}

