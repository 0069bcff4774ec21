import { describe, it, expect } from 'vitest';
import { normalizeRelativePath, toRelativePath, isExcludedPath, extensionOf, parseFileFilter, resolveWithinRoot } from './paths.js';

describe('normalizeRelativePath', () => {
  it('strips leading ./ and trailing slashes', () => {
    expect(normalizeRelativePath('./docs/guide.md')).toBe('docs/guide.md');
    expect(normalizeRelativePath('docs/')).toBe('docs');
  });

  it('normalizes backslashes', () => {
    expect(normalizeRelativePath('docs\\api\\auth.md')).toBe('docs/api/auth.md');
  });
});

describe('toRelativePath', () => {
  it('returns a forward-slash path under the root', () => {
    expect(toRelativePath('/project/docs/sub/a.md', '/project')).toBe('docs/sub/a.md');
  });
});

describe('isExcludedPath', () => {
  const excludes = ['node_modules', '.git', '__pycache__', 'archive'];

  it('matches on any path fragment', () => {
    expect(isExcludedPath('docs/archive/old.md', excludes)).toBe(true);
    expect(isExcludedPath('lib/__pycache__/x.py', excludes)).toBe(true);
    expect(isExcludedPath('.git/HEAD', excludes)).toBe(true);
  });

  it('keeps regular paths', () => {
    expect(isExcludedPath('docs/guide.md', excludes)).toBe(false);
  });

  it('ignores empty fragments', () => {
    expect(isExcludedPath('docs/guide.md', [''])).toBe(false);
  });
});

describe('extensionOf', () => {
  it('returns the lowercased extension', () => {
    expect(extensionOf('docs/README.MD')).toBe('.md');
    expect(extensionOf('src/app.test.ts')).toBe('.ts');
  });

  it('returns empty string for dotfiles and extensionless names', () => {
    expect(extensionOf('.gitignore')).toBe('');
    expect(extensionOf('docs.v2/Makefile')).toBe('');
  });
});

describe('parseFileFilter', () => {
  it('returns undefined for empty input', () => {
    expect(parseFileFilter(undefined)).toBeUndefined();
    expect(parseFileFilter(' , ')).toBeUndefined();
  });

  it('splits and normalizes a comma-separated list', () => {
    expect(parseFileFilter('docs/a.md, ./notes.txt ,docs\\b.md')).toEqual(
      new Set(['docs/a.md', 'notes.txt', 'docs/b.md'])
    );
  });
});

describe('resolveWithinRoot', () => {
  it('resolves paths under the root', () => {
    expect(resolveWithinRoot('/project', 'docs/a.md')).toBe('/project/docs/a.md');
    expect(resolveWithinRoot('/project/', './docs/../README.md')).toBe('/project/README.md');
  });

  it('rejects paths that escape the root', () => {
    expect(() => resolveWithinRoot('/project', '../etc/passwd')).toThrow('Path is outside the index root: ../etc/passwd');
    expect(() => resolveWithinRoot('/project', '/project-other/a.md')).toThrow('Path is outside the index root: /project-other/a.md');
  });
});
