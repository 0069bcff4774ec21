// chunk command - report how a file splits into chunks

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { chunkByHeadings, chunkByLines, type Chunk } from '../core/chunker.js';
import { loadConfig } from '../utils/config.js';
import { errorMessage } from '../utils/log.js';
import { normalizeRelativePath, resolveWithinRoot } from '../utils/paths.js';

export function registerChunkCommand(program: Command): void {
  program
    .command('chunk <file>')
    .description('Split a file by headings, or into fixed-size line chunks, and report sizes')
    .option('--lines <n>', 'Use fixed-size chunks of this many lines')
    .option('--json', 'Output raw JSON')
    .action((file: string, options: { lines?: string; json?: boolean }) => {
      const config = loadConfig();

      let chunks: Chunk[];
      try {
        const text = readFileSync(resolveWithinRoot(config.root, file), 'utf-8');
        if (options.lines !== undefined) {
          const size = parseInt(options.lines, 10);
          if (!Number.isFinite(size) || size < 1) {
            throw new Error(`--lines must be a positive integer, got "${options.lines}"`);
          }
          chunks = chunkByLines(text, size);
        } else {
          chunks = chunkByHeadings(text, normalizeRelativePath(file));
        }
      } catch (err) {
        console.error(chalk.red(`Cannot chunk "${file}":`), errorMessage(err));
        process.exit(1);
      }

      if (options.json) {
        console.log(JSON.stringify({ file, chunks }, null, 2));
        return;
      }

      const mode = options.lines !== undefined ? `${options.lines}-line chunks` : 'heading sections';
      console.log(chalk.cyan(`${file}: ${chunks.length} ${mode}\n`));
      for (const c of chunks) {
        console.log(chalk.white(`[${c.index + 1}] ${c.title}`));
        console.log(chalk.gray(
          `    Lines ${c.lineStart + 1}-${c.lineEnd} | ${c.chars} chars | ${c.terms} terms | ~${c.estimatedTokens} tokens`
        ));
      }
    });
}
