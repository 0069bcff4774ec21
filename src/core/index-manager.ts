// Index access for commands - snapshot first, rebuild when it cannot serve

import { resolve } from 'node:path';
import { buildIndex, type BuildOptions } from './indexer.js';
import { loadIndex, saveIndex } from '../storage/index-store.js';
import { logInfo } from '../utils/log.js';
import type { BuildResult, Config, CorpusIndex } from '../types.js';

export interface OpenIndexOptions extends BuildOptions {
  /** Section bodies are needed, which only a fresh build has. */
  fresh?: boolean;
}

export interface OpenedIndex {
  index: CorpusIndex;
  /** Set when the index was rebuilt rather than loaded. */
  build?: BuildResult;
}

/** What a build scanned: one directory recursively, or the configured layout under the project root. */
export interface IndexScope {
  root: string;
  explicit: boolean;
}

export async function rebuildIndex(config: Config, options: BuildOptions = {}): Promise<BuildResult> {
  const result = await buildIndex(config, options);
  saveIndex(result.index, config.indexPath);
  return result;
}

/**
 * The scope a caller wants. Without an explicit root, a snapshot built from
 * an explicit path keeps its scope until a plain build replaces it.
 */
export function resolveScope(config: Config, root: string | undefined, snapshot: CorpusIndex | null): IndexScope {
  if (root !== undefined) return { root: resolve(root), explicit: true };
  if (snapshot?.explicit) return { root: snapshot.root, explicit: true };
  return { root: resolve(config.root), explicit: false };
}

export async function openIndex(config: Config, options: OpenIndexOptions = {}): Promise<OpenedIndex> {
  const snapshot = loadIndex(config.indexPath);
  const scope = resolveScope(config, options.root, snapshot);

  if (!options.fresh) {
    if (snapshot && snapshot.root === scope.root && snapshot.explicit === scope.explicit) {
      return { index: snapshot };
    }
    logInfo('index', snapshot ? 'Snapshot was built for another scope, rebuilding' : 'No index snapshot found, building');
  }

  const build = await rebuildIndex(config, {
    onProgress: options.onProgress,
    root: scope.explicit ? scope.root : undefined,
  });
  return { index: build.index, build };
}
