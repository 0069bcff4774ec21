// Chunk reports - heading-based or fixed-size line windows with size figures

import { tokenize } from './tokenizer.js';
import { extractSections } from './sections.js';
import { estimateTokens } from '../utils/token-estimator.js';

export interface Chunk {
  index: number;
  title: string;
  lineStart: number;
  lineEnd: number;
  chars: number;
  terms: number;
  estimatedTokens: number;
}

function describeChunk(index: number, title: string, content: string, lineStart: number, lineEnd: number): Chunk {
  return {
    index,
    title,
    lineStart,
    lineEnd,
    chars: content.length,
    terms: tokenize(content).length,
    estimatedTokens: estimateTokens(content),
  };
}

export function chunkByHeadings(text: string, fallbackTitle: string): Chunk[] {
  return extractSections(text, fallbackTitle).map((section, i) =>
    describeChunk(i, section.header, section.content ?? '', section.lineStart, section.lineEnd)
  );
}

export function chunkByLines(text: string, linesPerChunk: number): Chunk[] {
  const size = Math.max(1, Math.floor(linesPerChunk));
  const lines = text.split('\n');
  const chunks: Chunk[] = [];

  for (let start = 0; start < lines.length; start += size) {
    const end = Math.min(start + size, lines.length);
    const content = lines.slice(start, end).join('\n');
    chunks.push(describeChunk(chunks.length, `lines ${start + 1}-${end}`, content, start, end));
  }
  return chunks;
}
