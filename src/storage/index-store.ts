// Index store - persists a compacted snapshot of the corpus index as JSON

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { errorMessage, logDebug, logWarn } from '../utils/log.js';
import type { CorpusIndex, FileRecord, IdfTable, Section } from '../types.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function readFileRecord(raw: unknown): FileRecord | null {
  if (!isObject(raw)) return null;
  const { path, size, lines, tokens } = raw;
  if (typeof path !== 'string' || !isNumber(size) || !isNumber(lines) || !isNumber(tokens)) return null;
  return { path, size, lines, tokens };
}

function readSection(raw: unknown): Section | null {
  if (!isObject(raw)) return null;
  const { file, header, hierarchy, tokens, lineStart, lineEnd } = raw;
  if (typeof file !== 'string' || typeof header !== 'string') return null;
  if (!isStringArray(hierarchy) || !isStringArray(tokens)) return null;
  if (!isNumber(lineStart) || !isNumber(lineEnd)) return null;
  return { file, header, hierarchy, tokens, lineStart, lineEnd };
}

function readIdf(raw: unknown): IdfTable | null {
  if (!isObject(raw)) return null;
  const idf: IdfTable = {};
  for (const [term, weight] of Object.entries(raw)) {
    if (!isNumber(weight)) return null;
    idf[term] = weight;
  }
  return idf;
}

function readList<T>(raw: unknown, read: (item: unknown) => T | null): T[] | null {
  if (!Array.isArray(raw)) return null;
  const out: T[] = [];
  for (const item of raw) {
    const parsed = read(item);
    if (!parsed) return null;
    out.push(parsed);
  }
  return out;
}

/**
 * Validate a parsed snapshot. Unknown fields are ignored so newer snapshots
 * stay readable; any missing or mistyped known field rejects the snapshot.
 */
export function parseSnapshot(raw: unknown): CorpusIndex | null {
  if (!isObject(raw)) return null;
  const { createdAt, root, explicit, totalTokens, totalChars } = raw;
  if (typeof createdAt !== 'string' || typeof root !== 'string') return null;
  if (!isNumber(totalTokens) || !isNumber(totalChars)) return null;
  // snapshots written before scans were scoped always used the configured layout
  const scoped = explicit ?? false;
  if (typeof scoped !== 'boolean') return null;

  const files = readList(raw.files, readFileRecord);
  const sections = readList(raw.sections, readSection);
  const idf = readIdf(raw.idf);
  if (!files || !sections || !idf) return null;

  return { createdAt, root, explicit: scoped, files, sections, idf, totalTokens, totalChars };
}

/** Copy of the index with every section body removed. */
export function compactIndex(index: CorpusIndex): CorpusIndex {
  return {
    ...index,
    sections: index.sections.map(({ content: _content, ...rest }) => rest),
  };
}

export function saveIndex(index: CorpusIndex, path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(compactIndex(index)));
  logDebug('store', `Saved index snapshot to ${path}`, { sections: index.sections.length });
}

/** Load the snapshot, or null when it is missing or unreadable. */
export function loadIndex(path: string): CorpusIndex | null {
  if (!existsSync(path)) return null;
  try {
    const index = parseSnapshot(JSON.parse(readFileSync(path, 'utf-8')));
    if (!index) {
      logWarn('store', `Ignoring malformed index snapshot at ${path}`);
    }
    return index;
  } catch (err) {
    logWarn('store', `Ignoring unreadable index snapshot at ${path}`, { error: errorMessage(err) });
    return null;
  }
}
