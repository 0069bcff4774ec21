// Inspection helpers - header outlines, aggregate stats, file previews

import { readFileSync } from 'node:fs';
import { resolveWithinRoot } from '../utils/paths.js';
import type { CorpusIndex } from '../types.js';

export interface FileHeaders {
  file: string;
  headers: string[];
}

export interface TermWeight {
  term: string;
  idf: number;
}

export interface IndexStats {
  createdAt: string;
  root: string;
  files: number;
  sections: number;
  terms: number;
  totalTokens: number;
  totalChars: number;
  topTerms: TermWeight[];
}

export interface FilePreview {
  path: string;
  totalLines: number;
  lines: string[];
}

/** Distinct section headers per file, in document order. */
export function listHeaders(index: Pick<CorpusIndex, 'sections'>): FileHeaders[] {
  const byFile = new Map<string, string[]>();
  for (const section of index.sections) {
    let headers = byFile.get(section.file);
    if (!headers) {
      headers = [];
      byFile.set(section.file, headers);
    }
    if (!headers.includes(section.header)) headers.push(section.header);
  }
  return Array.from(byFile, ([file, headers]) => ({ file, headers }));
}

/** Highest-IDF terms first; equal weights are ordered alphabetically. */
export function topTerms(index: Pick<CorpusIndex, 'idf'>, limit: number): TermWeight[] {
  return Object.entries(index.idf)
    .map(([term, idf]) => ({ term, idf }))
    .sort((a, b) => b.idf - a.idf || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
    .slice(0, Math.max(0, limit));
}

export function indexStats(index: CorpusIndex, topTermCount = 10): IndexStats {
  return {
    createdAt: index.createdAt,
    root: index.root,
    files: index.files.length,
    sections: index.sections.length,
    terms: Object.keys(index.idf).length,
    totalTokens: index.totalTokens,
    totalChars: index.totalChars,
    topTerms: topTerms(index, topTermCount),
  };
}

/** Leading lines of a file under `root`. Paths escaping the root are rejected. */
export function previewFile(root: string, file: string, lineCount: number): FilePreview {
  const all = readFileSync(resolveWithinRoot(root, file), 'utf-8').split('\n');
  return {
    path: file,
    totalLines: all.length,
    lines: all.slice(0, Math.max(0, lineCount)),
  };
}
