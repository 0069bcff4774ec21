import type { SearchResult } from '../types.js';

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function resultCost(result: SearchResult): number {
  return estimateTokens(`${result.file} ${result.header} ${result.hierarchy.join(' > ')} ${result.preview ?? ''}`);
}

/**
 * Keep results in rank order until the token budget is spent. The first
 * result is always kept.
 */
export function truncateToTokenBudget(
  results: SearchResult[],
  budget: number,
): { results: SearchResult[]; totalTokens: number; truncated: boolean } {
  let used = 0;
  const kept: SearchResult[] = [];
  for (const r of results) {
    const cost = resultCost(r);
    if (used + cost > budget && kept.length > 0) {
      return { results: kept, totalTokens: used, truncated: true };
    }
    used += cost;
    kept.push(r);
  }
  return { results: kept, totalTokens: used, truncated: false };
}
