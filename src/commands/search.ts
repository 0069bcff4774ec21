// Search commands - ranked search and file-scoped search

import { Command } from 'commander';
import chalk from 'chalk';
import { search } from '../core/searcher.js';
import { openIndex } from '../core/index-manager.js';
import { loadConfig } from '../utils/config.js';
import { errorMessage } from '../utils/log.js';
import { parseFileFilter } from '../utils/paths.js';
import { truncateToTokenBudget } from '../utils/token-estimator.js';
import { formatCsv, formatFiles, formatHierarchy, formatLines, formatMarkdown } from '../utils/formatters.js';
import type { SearchResult } from '../types.js';

interface RunOptions {
  limit?: string;
  files?: Set<string>;
  fresh: boolean;
  format: string;
  budget?: string;
}

function parseCount(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  const n = parseInt(value, 10);
  if (!Number.isFinite(n) || n < 1) {
    throw new Error(`--${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

function printHuman(results: SearchResult[], truncated: boolean): void {
  console.log(chalk.green(`\nFound ${results.length} matches:\n`));

  results.forEach((r, i) => {
    console.log(chalk.cyan(`[${i + 1}] ${r.file}`) + chalk.gray(` (score ${r.score.toFixed(4)})`));
    console.log(chalk.white(`    ${formatHierarchy(r)}`));
    console.log(chalk.gray(`    Lines ${formatLines(r)} | matched: ${r.matched.join(', ')}`));

    if (r.preview) {
      console.log(chalk.gray('    ─────────────────────────────────────────────────'));
      const previewLines = r.preview.split('\n');
      for (const line of previewLines.slice(0, 5)) {
        console.log(chalk.white(`    ${line}`));
      }
      if (previewLines.length > 5) {
        console.log(chalk.gray('    ...'));
      }
    }
    console.log();
  });

  if (truncated) {
    console.log(chalk.yellow('Results truncated to fit the token budget.'));
  }
}

async function runSearch(query: string, options: RunOptions): Promise<void> {
  const config = loadConfig();
  const limit = parseCount(options.limit, config.searchTopK, 'limit');
  const budget = options.budget === undefined ? undefined : parseCount(options.budget, 0, 'budget');

  const { index } = await openIndex(config, { fresh: options.fresh });
  let results = search(index, query, limit, { files: options.files, previewChars: config.previewChars });
  let truncated = false;
  if (budget !== undefined) {
    ({ results, truncated } = truncateToTokenBudget(results, budget));
  }

  if (results.length === 0) {
    if (options.format === 'json') {
      console.log(JSON.stringify({ query, results: [] }));
    } else {
      console.log(chalk.yellow('No matches found.'));
    }
    return;
  }

  switch (options.format) {
    case 'json':
      console.log(JSON.stringify({ query, results, truncated }, null, 2));
      break;
    case 'csv':
      console.log(formatCsv(results));
      break;
    case 'markdown':
      console.log(formatMarkdown(results, query));
      break;
    case 'files':
      console.log(formatFiles(results));
      break;
    default:
      printHuman(results, truncated);
  }
}

export function registerSearchCommands(program: Command): void {
  program
    .command('search <query>')
    .description('Rank indexed sections against a query')
    .option('-l, --limit <n>', 'Number of results (default from config)')
    .option('--files <list>', 'Comma-separated file paths to restrict the search to')
    .option('-p, --preview', 'Rebuild the index so results carry content previews')
    .option('-b, --budget <tokens>', 'Drop trailing results beyond a token budget')
    .option('-f, --format <type>', 'Output format (human|json|csv|markdown|files)', 'human')
    .action(async (query: string, options: { limit?: string; files?: string; preview?: boolean; budget?: string; format: string }) => {
      try {
        await runSearch(query, {
          limit: options.limit,
          files: parseFileFilter(options.files),
          fresh: options.preview ?? false,
          format: options.format,
          budget: options.budget,
        });
      } catch (err) {
        console.error(chalk.red('Search failed:'), errorMessage(err));
        process.exit(1);
      }
    });

  program
    .command('search-in <files> <query>')
    .description('Search only the given comma-separated files, with previews')
    .option('-l, --limit <n>', 'Number of results (default from config)')
    .option('-f, --format <type>', 'Output format (human|json|csv|markdown|files)', 'human')
    .action(async (files: string, query: string, options: { limit?: string; format: string }) => {
      const filter = parseFileFilter(files);
      if (!filter) {
        console.error(chalk.red('search-in needs at least one file path'));
        process.exit(1);
      }
      try {
        await runSearch(query, { limit: options.limit, files: filter, fresh: true, format: options.format });
      } catch (err) {
        console.error(chalk.red('Search failed:'), errorMessage(err));
        process.exit(1);
      }
    });
}
