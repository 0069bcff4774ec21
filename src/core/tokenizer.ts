// Tokenizer - lowercases text and extracts index terms

import { readFileSync } from 'node:fs';

const TERM_PATTERN = /[a-z][a-z0-9_]+/g;
const MIN_TERM_LENGTH = 3;

function loadStopwords(): Set<string> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/stopwords.json', import.meta.url), 'utf-8')
  );
  if (!Array.isArray(raw)) return new Set();
  return new Set(raw.filter((w): w is string => typeof w === 'string'));
}

export const STOPWORDS: ReadonlySet<string> = loadStopwords();

/**
 * Split text into index terms. Order and duplicates are kept so callers can
 * count term frequencies from the result.
 */
export function tokenize(text: string): string[] {
  if (typeof text !== 'string' || text.length === 0) return [];
  const matches = text.toLowerCase().match(TERM_PATTERN);
  if (!matches) return [];
  return matches.filter(t => t.length >= MIN_TERM_LENGTH && !STOPWORDS.has(t));
}
