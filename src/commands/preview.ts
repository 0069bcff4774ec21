// preview command - leading lines of a file under the index root

import { Command } from 'commander';
import chalk from 'chalk';
import { previewFile } from '../core/inspect.js';
import { loadConfig } from '../utils/config.js';
import { errorMessage } from '../utils/log.js';

export function registerPreviewCommand(program: Command): void {
  program
    .command('preview <file>')
    .description('Show the leading lines of a file')
    .option('-n, --lines <n>', 'Number of lines', '40')
    .option('--raw', 'Output lines only (no header or numbers)')
    .action((file: string, options: { lines: string; raw?: boolean }) => {
      const config = loadConfig();
      const count = parseInt(options.lines, 10);
      if (!Number.isFinite(count) || count < 1) {
        console.error(chalk.red(`--lines must be a positive integer, got "${options.lines}"`));
        process.exit(1);
      }

      try {
        const preview = previewFile(config.root, file, count);

        if (options.raw) {
          console.log(preview.lines.join('\n'));
          return;
        }

        console.log(chalk.cyan(`File: ${preview.path}`));
        console.log(chalk.gray(`Showing ${preview.lines.length} of ${preview.totalLines} lines`));
        console.log(chalk.gray('─────────────────────────────────────────────────'));
        const width = String(preview.lines.length).length;
        preview.lines.forEach((line, i) => {
          console.log(chalk.gray(`${String(i + 1).padStart(width)} │ `) + line);
        });
        if (preview.totalLines > preview.lines.length) {
          console.log(chalk.gray(`... ${preview.totalLines - preview.lines.length} more lines`));
        }
      } catch (err) {
        console.error(chalk.red(`Cannot preview "${file}":`), errorMessage(err));
        process.exit(1);
      }
    });
}
