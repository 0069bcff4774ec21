// headers command - section outline of the index grouped by file

import { Command } from 'commander';
import chalk from 'chalk';
import { listHeaders } from '../core/inspect.js';
import { openIndex } from '../core/index-manager.js';
import { loadConfig } from '../utils/config.js';
import { errorMessage } from '../utils/log.js';

export function registerHeadersCommand(program: Command): void {
  program
    .command('headers')
    .description('List distinct section headers grouped by file')
    .option('--json', 'Output raw JSON')
    .action(async (options: { json?: boolean }) => {
      const config = loadConfig();

      try {
        const { index } = await openIndex(config);
        const grouped = listHeaders(index);

        if (options.json) {
          console.log(JSON.stringify(grouped, null, 2));
          return;
        }

        for (const { file, headers } of grouped) {
          console.log(chalk.cyan(file));
          for (const header of headers) {
            console.log(chalk.white(`  - ${header}`));
          }
        }
        console.log(chalk.gray(`\n${grouped.length} files`));
      } catch (err) {
        console.error(chalk.red('Cannot list headers:'), errorMessage(err));
        process.exit(1);
      }
    });
}
