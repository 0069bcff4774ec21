// Section extraction - splits a document into heading-delimited sections

import { tokenize } from './tokenizer.js';
import type { Section } from '../types.js';

export type ExtractedSection = Omit<Section, 'file'>;

interface HeadingFrame {
  depth: number;
  title: string;
}

const HEADING_PATTERN = /^(#{1,4})\s+(.+?)\s*$/;
const FENCE_PATTERN = /^\s{0,3}(`{3,}|~{3,})/;

export function countLines(text: string): number {
  return text.split('\n').length;
}

export function parseHeading(line: string): HeadingFrame | null {
  const match = HEADING_PATTERN.exec(line);
  if (!match) return null;
  return { depth: match[1].length, title: match[2] };
}

/**
 * Split structured text on `#` to `####` headings.
 *
 * Emitted sections partition `[0, lineCount)`: a heading line belongs to the
 * section it opens, a heading-only span is folded into the next emitted
 * section, and trailing blank lines are folded into the last one. Lines inside
 * fenced code blocks are body text.
 */
export function extractSections(text: string, fallbackHeader: string): ExtractedSection[] {
  const lines = text.split('\n');
  const sections: ExtractedSection[] = [];
  const stack: HeadingFrame[] = [];
  let body: string[] = [];
  let header = fallbackHeader;
  let rangeStart = 0;
  let fence: string | undefined;

  const flush = (end: number): void => {
    const content = body.join('\n');
    if (content.trim().length === 0) return;
    sections.push({
      header,
      // the top of the stack is the section's own heading
      hierarchy: stack.slice(0, -1).map(f => f.title),
      content,
      tokens: tokenize(`${content} ${header}`),
      lineStart: rangeStart,
      lineEnd: end,
    });
    rangeStart = end;
  };

  for (let i = 0; i < lines.length; i++) {
    const marker = FENCE_PATTERN.exec(lines[i])?.[1];
    if (fence !== undefined) {
      // a fence closes on the same character repeated at least as often
      if (marker && marker[0] === fence[0] && marker.length >= fence.length) fence = undefined;
      body.push(lines[i]);
      continue;
    }
    if (marker) {
      fence = marker;
      body.push(lines[i]);
      continue;
    }

    const heading = parseHeading(lines[i]);
    if (!heading) {
      body.push(lines[i]);
      continue;
    }

    flush(i);
    while (stack.length > 0 && stack[stack.length - 1].depth >= heading.depth) {
      stack.pop();
    }
    stack.push(heading);
    header = heading.title;
    body = [];
  }

  flush(lines.length);
  if (sections.length > 0) {
    sections[sections.length - 1].lineEnd = lines.length;
  }
  return sections;
}

/**
 * Single section for unstructured text. The stored body is capped but tokens
 * come from the full text.
 */
export function extractWholeDocument(text: string, header: string, cap: number): ExtractedSection[] {
  if (text.trim().length === 0) return [];
  return [{
    header,
    hierarchy: [],
    content: text.slice(0, cap),
    tokens: tokenize(`${text} ${header}`),
    lineStart: 0,
    lineEnd: countLines(text),
  }];
}
