// Error types for failures that must reach the caller

export type DocnavErrorCode = 'ROOT_UNREADABLE';

export class DocnavError extends Error {
  public readonly code: DocnavErrorCode;

  constructor(message: string, code: DocnavErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocnavError';
    this.code = code;
  }
}

/** The index root (or a configured source directory) cannot be enumerated. */
export class IndexRootError extends DocnavError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Cannot read index root: ${path}`, 'ROOT_UNREADABLE', { cause });
    this.name = 'IndexRootError';
    this.path = path;
  }
}
