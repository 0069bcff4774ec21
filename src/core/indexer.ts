// Indexer - scans files, extracts sections, and computes IDF weights

import { readdirSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { glob } from 'glob';
import { tokenize } from './tokenizer.js';
import { countLines, extractSections, extractWholeDocument } from './sections.js';
import { IndexRootError } from './errors.js';
import { errorMessage, logDebug, logInfo, logWarn } from '../utils/log.js';
import { getConfigPath } from '../utils/config.js';
import { extensionOf, isExcludedPath, toRelativePath } from '../utils/paths.js';
import type { BuildResult, Config, CorpusIndex, IdfTable, Section, SkippedFile } from '../types.js';

export interface IndexProgress {
  total: number;
  processed: number;
  file: string;
}

export interface BuildOptions {
  /** Scan this directory recursively instead of the configured sources. */
  root?: string;
  onProgress?: (p: IndexProgress) => void;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Read a file as strict UTF-8; permission and encoding failures come back as a reason. */
function readDocument(file: string): { text: string; size: number } | { reason: string } {
  try {
    const bytes = readFileSync(file);
    return { text: utf8.decode(bytes), size: bytes.length };
  } catch (err) {
    return { reason: errorMessage(err) };
  }
}

function assertReadableDir(dir: string): void {
  try {
    readdirSync(dir);
  } catch (err) {
    throw new IndexRootError(dir, err);
  }
}

function isReadableDir(dir: string): boolean {
  try {
    readdirSync(dir);
    return true;
  } catch {
    return false;
  }
}

async function scanDirectory(dir: string, pattern: string, excludePaths: readonly string[]): Promise<string[]> {
  return glob(pattern, {
    cwd: dir,
    absolute: true,
    nodir: true,
    dot: true,
    ignore: excludePaths.map(p => `**/${p}/**`),
  });
}

/**
 * Resolve candidate files as absolute paths, de-duplicated and sorted.
 * Without an explicit root this is every configured source directory plus
 * the top-level files of the project root.
 */
export async function discoverFiles(config: Config, indexRoot: string, explicit: boolean): Promise<string[]> {
  assertReadableDir(indexRoot);

  const found = new Set<string>();
  const add = (paths: string[]) => paths.forEach(p => found.add(p));

  if (explicit) {
    add(await scanDirectory(indexRoot, '**/*', config.excludePaths));
  } else {
    add(await scanDirectory(indexRoot, '*', config.excludePaths));
    for (const source of config.sources) {
      const dir = resolve(indexRoot, source);
      if (!isReadableDir(dir)) {
        logDebug('indexer', `Source directory not found, skipping: ${source}`);
        continue;
      }
      add(await scanDirectory(dir, '**/*', config.excludePaths));
    }
  }

  const allowed = new Set(config.extensions.map(e => e.toLowerCase()));
  // the tool's own state files are never documents
  const stateFiles = new Set([resolve(config.indexPath), resolve(getConfigPath(config.root))]);

  return Array.from(found)
    .filter(file => !stateFiles.has(file))
    .filter(file => {
      const rel = toRelativePath(file, indexRoot);
      return allowed.has(extensionOf(rel)) && !isExcludedPath(rel, config.excludePaths);
    })
    .sort();
}

export function computeIdf(sections: readonly Pick<Section, 'tokens'>[]): IdfTable {
  const total = sections.length;
  const documentFrequency = new Map<string, number>();
  for (const section of sections) {
    for (const term of new Set(section.tokens)) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const idf: IdfTable = {};
  for (const [term, df] of documentFrequency) {
    // a term found in every section has no discriminating power
    if (df === total) continue;
    idf[term] = Math.log(total / df);
  }
  return idf;
}

export async function buildIndex(config: Config, options: BuildOptions = {}): Promise<BuildResult> {
  const explicit = options.root !== undefined;
  const indexRoot = resolve(options.root ?? config.root);
  const files = await discoverFiles(config, indexRoot, explicit);
  const structured = new Set(config.structuredExtensions.map(e => e.toLowerCase()));

  const index: CorpusIndex = {
    createdAt: new Date().toISOString(),
    root: indexRoot,
    explicit,
    files: [],
    sections: [],
    idf: {},
    totalTokens: 0,
    totalChars: 0,
  };
  const skipped: SkippedFile[] = [];

  logInfo('indexer', `Scanning ${files.length} files`, { root: indexRoot });

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const rel = toRelativePath(file, indexRoot);
    options.onProgress?.({ total: files.length, processed: i + 1, file: rel });

    const doc = readDocument(file);
    if ('reason' in doc) {
      logWarn('indexer', `Skipping unreadable file ${rel}`, { reason: doc.reason });
      skipped.push({ path: rel, reason: doc.reason });
      continue;
    }

    const { text } = doc;
    const tokenCount = tokenize(text).length;
    index.files.push({
      path: rel,
      size: doc.size,
      lines: countLines(text),
      tokens: tokenCount,
    });

    const extracted = structured.has(extensionOf(rel))
      ? extractSections(text, rel)
      : extractWholeDocument(text, rel, config.wholeDocumentCap);
    for (const section of extracted) {
      index.sections.push({ file: rel, ...section });
    }

    index.totalTokens += tokenCount;
    index.totalChars += text.length;
  }

  index.idf = computeIdf(index.sections);

  logInfo('indexer', `Indexed ${index.files.length} files into ${index.sections.length} sections`, {
    terms: Object.keys(index.idf).length,
    skipped: skipped.length,
  });

  return { index, skipped };
}
