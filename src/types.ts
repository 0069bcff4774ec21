// Types for the docnav index and CLI

export interface Config {
  root: string;
  sources: string[];
  extensions: string[];
  structuredExtensions: string[];
  excludePaths: string[];
  indexPath: string;
  searchTopK: number;
  previewChars: number;
  wholeDocumentCap: number;
}

export interface Section {
  file: string;
  header: string;
  hierarchy: string[];
  /** Only present on a freshly built index; dropped when the index is saved. */
  content?: string;
  tokens: string[];
  lineStart: number;
  lineEnd: number;
}

export interface FileRecord {
  path: string;
  size: number;
  lines: number;
  tokens: number;
}

export type IdfTable = Record<string, number>;

export interface CorpusIndex {
  createdAt: string;
  root: string;
  /** True when `root` was scanned recursively rather than through the configured layout. */
  explicit: boolean;
  files: FileRecord[];
  sections: Section[];
  idf: IdfTable;
  totalTokens: number;
  totalChars: number;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface BuildResult {
  index: CorpusIndex;
  skipped: SkippedFile[];
}

export interface SearchResult {
  file: string;
  header: string;
  hierarchy: string[];
  score: number;
  matched: string[];
  lineStart: number;
  lineEnd: number;
  preview?: string;
}
