import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { buildIndex, computeIdf } from './indexer.js';
import { IndexRootError } from './errors.js';
import { defaultConfig } from '../utils/config.js';

let root: string;

function write(rel: string, content: string | Buffer): void {
  const path = join(root, rel);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'docnav-indexer-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe('computeIdf', () => {
  it('returns an empty table for zero sections', () => {
    expect(computeIdf([])).toEqual({});
  });

  it('counts each section once per term and skips terms found everywhere', () => {
    const idf = computeIdf([
      { tokens: ['alpha', 'common', 'alpha'] },
      { tokens: ['common', 'beta', 'beta'] },
      { tokens: ['common', 'beta'] },
    ]);
    expect(Object.keys(idf).sort()).toEqual(['alpha', 'beta']);
    expect(idf.alpha).toBeCloseTo(Math.log(3), 10);
    expect(idf.beta).toBeCloseTo(Math.log(3 / 2), 10);
  });

  it('is empty for a single-section corpus', () => {
    expect(computeIdf([{ tokens: ['lonely', 'section'] }])).toEqual({});
  });

  it('handles terms that shadow Object.prototype members', () => {
    const idf = computeIdf([{ tokens: ['constructor'] }, { tokens: ['other'] }]);
    expect(Object.entries(idf)).toEqual([
      ['constructor', Math.log(2)],
      ['other', Math.log(2)],
    ]);
  });
});

describe('buildIndex', () => {
  it('indexes a two-file corpus', async () => {
    write('docs/a.md', '# Setup\nInstall the tool. Configure the tool.');
    write('docs/b.md', 'Run the tool.');

    const { index, skipped } = await buildIndex(defaultConfig(root));

    expect(skipped).toEqual([]);
    expect(index.root).toBe(root);
    expect(index.explicit).toBe(false);
    expect(index.files).toEqual([
      { path: 'docs/a.md', size: 45, lines: 2, tokens: 5 },
      { path: 'docs/b.md', size: 13, lines: 1, tokens: 2 },
    ]);
    expect(index.sections).toEqual([
      {
        file: 'docs/a.md',
        header: 'Setup',
        hierarchy: [],
        content: 'Install the tool. Configure the tool.',
        tokens: ['install', 'tool', 'configure', 'tool', 'setup'],
        lineStart: 0,
        lineEnd: 2,
      },
      {
        file: 'docs/b.md',
        header: 'docs/b.md',
        hierarchy: [],
        content: 'Run the tool.',
        tokens: ['run', 'tool', 'docs'],
        lineStart: 0,
        lineEnd: 1,
      },
    ]);
    expect(index.totalTokens).toBe(7);
    expect(index.totalChars).toBe(58);
    expect(Object.keys(index.idf).sort()).toEqual(['configure', 'docs', 'install', 'run', 'setup']);
    expect(index.idf.configure).toBeCloseTo(Math.log(2), 10);
    expect(Number.isNaN(Date.parse(index.createdAt))).toBe(false);
  });

  it('applies the default source layout and exclusions', async () => {
    write('README.md', 'Top level readme text');
    write('tool.py', '# not a heading\nprint("hello")\n');
    write('docs/guide.md', 'guide body');
    write('docs/image.png', 'binary-ish');
    write('docs/node_modules/pkg/readme.md', 'vendored');
    write('docs/archive/old.md', 'stale notes');
    write('.docnav/notes.md', 'working notes');
    write('.docnav/index.json', '{}');
    write('.docnav/config.json', '{"searchTopK": 3}');
    write('src/deep.md', 'outside the sources');

    const { index } = await buildIndex(defaultConfig(root));

    expect(index.files.map(f => f.path)).toEqual([
      '.docnav/notes.md',
      'README.md',
      'docs/guide.md',
      'tool.py',
    ]);
    const py = index.sections.find(s => s.file === 'tool.py');
    expect(py?.header).toBe('tool.py');
    expect(py?.content).toBe('# not a heading\nprint("hello")\n');
    expect(py?.lineEnd).toBe(3);
  });

  it('scans an explicit root recursively with paths relative to it', async () => {
    write('src/deep.md', '# Deep\nnested content');
    write('src/lib/util.ts', 'export const answer = 42;');

    const { index } = await buildIndex(defaultConfig(root), { root: join(root, 'src') });

    expect(index.root).toBe(join(root, 'src'));
    expect(index.explicit).toBe(true);
    expect(index.files.map(f => f.path)).toEqual(['deep.md', 'lib/util.ts']);
  });

  it('caps whole-document bodies but keeps every token', async () => {
    write('docs/data.json', `{"a": "${'x'.repeat(200)}", "marker_term": true}`);
    const config = { ...defaultConfig(root), wholeDocumentCap: 100 };

    const { index } = await buildIndex(config);

    expect(index.sections[0].content).toHaveLength(100);
    expect(index.sections[0].tokens).toContain('marker_term');
  });

  it('skips files that are not valid UTF-8 and keeps going', async () => {
    write('docs/bad.md', Buffer.from([0xff, 0xfe, 0xfd]));
    write('docs/good.md', 'readable content');
    const progress: string[] = [];

    const { index, skipped } = await buildIndex(defaultConfig(root), {
      onProgress: p => progress.push(`${p.processed}/${p.total} ${p.file}`),
    });

    expect(skipped.map(s => s.path)).toEqual(['docs/bad.md']);
    expect(index.files.map(f => f.path)).toEqual(['docs/good.md']);
    expect(progress).toEqual(['1/2 docs/bad.md', '2/2 docs/good.md']);
  });

  it('produces an empty index for an empty root', async () => {
    const { index } = await buildIndex(defaultConfig(root));
    expect(index.files).toEqual([]);
    expect(index.sections).toEqual([]);
    expect(index.idf).toEqual({});
  });

  it('fails when the root cannot be enumerated', async () => {
    const missing = join(root, 'missing');
    await expect(buildIndex(defaultConfig(root), { root: missing })).rejects.toBeInstanceOf(IndexRootError);
    await expect(buildIndex(defaultConfig(missing))).rejects.toMatchObject({ code: 'ROOT_UNREADABLE', path: missing });
  });
});
