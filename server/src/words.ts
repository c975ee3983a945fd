import { readFileSync } from 'node:fs';

function loadWordPool(): string[] {
  const raw: unknown = JSON.parse(readFileSync(new URL('./words.json', import.meta.url), 'utf8'));
  if (!Array.isArray(raw)) throw new Error('words.json must contain an array of words.');
  return raw.filter((w): w is string => typeof w === 'string' && w.trim().length > 0);
}

export const WORD_POOL: readonly string[] = loadWordPool();
