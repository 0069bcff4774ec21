// Path helpers - index paths are root-relative and always use forward slashes

import { relative, resolve, sep } from 'node:path';

export function normalizeRelativePath(path: string): string {
  return path.trim().replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/\/+$/, '');
}

export function toRelativePath(absolutePath: string, root: string): string {
  return normalizeRelativePath(relative(root, absolutePath));
}

export function isExcludedPath(path: string, excludePaths: readonly string[]): boolean {
  const normalized = path.replace(/\\/g, '/');
  return excludePaths.some(fragment => fragment.length > 0 && normalized.includes(fragment));
}

export function extensionOf(path: string): string {
  const name = path.slice(path.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

/**
 * Parse a comma-separated file list into a filter set. An empty list means
 * "no filter" and yields undefined.
 */
export function parseFileFilter(csv: string | undefined): Set<string> | undefined {
  if (!csv) return undefined;
  const paths = csv.split(',').map(normalizeRelativePath).filter(p => p.length > 0);
  return paths.length > 0 ? new Set(paths) : undefined;
}

/** Absolute path of `file` under `root`; throws when the path escapes the root. */
export function resolveWithinRoot(root: string, file: string): string {
  const base = resolve(root);
  const target = resolve(base, file);
  if (target !== base && !target.startsWith(base + sep)) {
    throw new Error(`Path is outside the index root: ${file}`);
  }
  return target;
}
