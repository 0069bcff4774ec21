// Library exports

export { tokenize, STOPWORDS } from './core/tokenizer.js';
export { extractSections, extractWholeDocument, parseHeading } from './core/sections.js';
export { buildIndex, computeIdf, discoverFiles } from './core/indexer.js';
export type { BuildOptions, IndexProgress } from './core/indexer.js';
export { search, idfWeight } from './core/searcher.js';
export type { SearchOptions } from './core/searcher.js';
export { openIndex, rebuildIndex } from './core/index-manager.js';
export { listHeaders, indexStats, topTerms, previewFile } from './core/inspect.js';
export { chunkByHeadings, chunkByLines } from './core/chunker.js';
export type { Chunk } from './core/chunker.js';
export { DocnavError, IndexRootError } from './core/errors.js';
export { saveIndex, loadIndex, compactIndex } from './storage/index-store.js';
export { loadConfig, defaultConfig, validateConfig } from './utils/config.js';
export type {
  Config,
  Section,
  FileRecord,
  IdfTable,
  CorpusIndex,
  SkippedFile,
  BuildResult,
  SearchResult,
} from './types.js';
