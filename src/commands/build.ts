// Build command

import { Command } from 'commander';
import chalk from 'chalk';
import { rebuildIndex } from '../core/index-manager.js';
import { loadConfig } from '../utils/config.js';
import { errorMessage } from '../utils/log.js';

export function registerBuildCommand(program: Command): void {
  program
    .command('build [path]')
    .description('Build or rebuild the section index')
    .option('--json', 'Output a JSON summary')
    .action(async (path: string | undefined, options: { json?: boolean }) => {
      const config = loadConfig();
      const started = Date.now();

      try {
        const { index, skipped } = await rebuildIndex(config, { root: path });
        const terms = Object.keys(index.idf).length;

        if (options.json) {
          console.log(JSON.stringify({
            root: index.root,
            files: index.files.length,
            sections: index.sections.length,
            terms,
            skipped,
            indexPath: config.indexPath,
          }, null, 2));
          return;
        }

        console.log(chalk.green(`Done. Indexed ${index.files.length} files into ${index.sections.length} sections`));
        console.log(chalk.gray(`  Root:   ${index.root}`));
        console.log(chalk.gray(`  Terms:  ${terms} weighted`));
        console.log(chalk.gray(`  Tokens: ${index.totalTokens} (${index.totalChars} chars)`));
        console.log(chalk.gray(`  Saved:  ${config.indexPath}`));
        console.log(chalk.gray(`  Time:   ${Date.now() - started}ms`));

        if (skipped.length > 0) {
          console.log(chalk.yellow(`\nSkipped ${skipped.length} unreadable files:`));
          for (const s of skipped.slice(0, 5)) {
            console.log(chalk.red(`  - ${s.path}: ${s.reason}`));
          }
          if (skipped.length > 5) {
            console.log(chalk.gray(`  ... and ${skipped.length - 5} more`));
          }
        }
      } catch (err) {
        console.error(chalk.red('Build failed:'), errorMessage(err));
        process.exit(1);
      }
    });
}
