// Searcher - TF-IDF ranking of indexed sections

import { tokenize } from './tokenizer.js';
import type { CorpusIndex, IdfTable, SearchResult } from '../types.js';

export const DEFAULT_PREVIEW_CHARS = 300;

/** Terms missing from the table weigh 1.0 rather than 0 so they still count. */
const MISSING_TERM_WEIGHT = 1.0;

export interface SearchOptions {
  /** Only sections whose file is in this set are scored. */
  files?: ReadonlySet<string>;
  previewChars?: number;
}

export function idfWeight(idf: IdfTable, term: string): number {
  return Object.hasOwn(idf, term) ? idf[term] : MISSING_TERM_WEIGHT;
}

function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Score every section against the query and return the best `topN`,
 * highest score first. Equal scores keep index order. Previews are only
 * filled in when the index still carries section bodies.
 */
export function search(
  index: Pick<CorpusIndex, 'sections' | 'idf'>,
  query: string,
  topN: number,
  options: SearchOptions = {}
): SearchResult[] {
  const queryTerms = [...new Set(tokenize(query))];
  if (queryTerms.length === 0 || topN < 1) return [];

  const previewChars = options.previewChars ?? DEFAULT_PREVIEW_CHARS;
  const results: SearchResult[] = [];

  for (const section of index.sections) {
    if (options.files && !options.files.has(section.file)) continue;

    const counts = countTerms(section.tokens);
    const total = Math.max(1, section.tokens.length);
    let score = 0;
    const matched: string[] = [];

    for (const term of queryTerms) {
      const count = counts.get(term);
      if (!count) continue;
      score += (count / total) * idfWeight(index.idf, term);
      matched.push(term);
    }

    if (matched.length === 0) continue;

    const result: SearchResult = {
      file: section.file,
      header: section.header,
      hierarchy: [...section.hierarchy],
      score,
      matched,
      lineStart: section.lineStart,
      lineEnd: section.lineEnd,
    };
    if (section.content !== undefined) {
      result.preview = section.content.trim().slice(0, previewChars);
    }
    results.push(result);
  }

  // Array.prototype.sort is stable, so ties keep section order
  results.sort((a, b) => b.score - a.score);
  return results.slice(0, topN);
}
