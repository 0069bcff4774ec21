// stats command - aggregate index statistics

import { Command } from 'commander';
import chalk from 'chalk';
import { indexStats } from '../core/inspect.js';
import { openIndex } from '../core/index-manager.js';
import { loadConfig, getConfigPath } from '../utils/config.js';
import { errorMessage } from '../utils/log.js';

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show index statistics and the most distinctive terms')
    .option('-t, --top <n>', 'Number of top IDF terms', '10')
    .option('--json', 'Output raw JSON')
    .action(async (options: { top: string; json?: boolean }) => {
      const config = loadConfig();
      const top = parseInt(options.top, 10);

      try {
        const { index } = await openIndex(config);
        const stats = indexStats(index, Number.isFinite(top) ? top : 10);

        if (options.json) {
          console.log(JSON.stringify(stats, null, 2));
          return;
        }

        console.log(chalk.blue('\nIndex Status\n'));
        console.log(chalk.gray('Config: ') + getConfigPath(config.root));
        console.log(chalk.gray('Index:  ') + config.indexPath);
        console.log(chalk.gray('Root:   ') + stats.root);
        console.log(chalk.gray('Built:  ') + stats.createdAt);

        console.log(chalk.gray('\nIndex Stats:'));
        console.log(chalk.white(`  Files:    ${stats.files}`));
        console.log(chalk.white(`  Sections: ${stats.sections}`));
        console.log(chalk.white(`  Terms:    ${stats.terms}`));
        console.log(chalk.white(`  Tokens:   ${stats.totalTokens}`));
        console.log(chalk.white(`  Chars:    ${stats.totalChars}`));

        if (stats.topTerms.length > 0) {
          console.log(chalk.gray('\nMost distinctive terms:'));
          for (const { term, idf } of stats.topTerms) {
            console.log(chalk.white(`  ${term.padEnd(24)} ${idf.toFixed(4)}`));
          }
        }
        console.log();
      } catch (err) {
        console.error(chalk.red('Cannot read index:'), errorMessage(err));
        process.exit(1);
      }
    });
}
