import type { SearchResult } from '../types.js';

export function formatHierarchy(r: Pick<SearchResult, 'hierarchy' | 'header'>): string {
  return [...r.hierarchy, r.header].join(' > ');
}

export function formatLines(r: Pick<SearchResult, 'lineStart' | 'lineEnd'>): string {
  // stored ranges are 0-based and half-open; display them 1-based and inclusive
  return `${r.lineStart + 1}-${r.lineEnd}`;
}

export function formatCsv(results: SearchResult[]): string {
  const header = 'file,section,score,lines,matched';
  const rows = results.map(r => {
    const section = formatHierarchy(r).replace(/"/g, '""');
    return `"${r.file}","${section}",${r.score.toFixed(4)},${formatLines(r)},"${r.matched.join(' ')}"`;
  });
  return [header, ...rows].join('\n');
}

export function formatMarkdown(results: SearchResult[], query: string): string {
  const header = `# Search: ${query}\n\n| # | File | Section | Score | Lines |\n|---|------|---------|-------|-------|\n`;
  const rows = results.map((r, i) => {
    const section = formatHierarchy(r).replace(/\|/g, '\\|');
    return `| ${i + 1} | ${r.file} | ${section} | ${r.score.toFixed(4)} | ${formatLines(r)} |`;
  }).join('\n');
  return header + rows;
}

export function formatFiles(results: SearchResult[]): string {
  const unique = [...new Set(results.map(r => r.file))];
  return unique.join('\n');
}
