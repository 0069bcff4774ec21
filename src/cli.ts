#!/usr/bin/env node
// docnav CLI - section-level keyword search over project documentation

import { Command } from 'commander';
import { registerCommands } from './commands/index.js';
import { setRootOverride } from './utils/config.js';

const program = new Command();

program
  .name('docnav')
  .description('Section-level TF-IDF search over project documentation')
  .version('1.0.0')
  .option('--root <dir>', 'Project root (defaults to the current directory)');

program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts<{ root?: string }>();
  if (opts.root) {
    setRootOverride(opts.root);
  }
});

registerCommands(program);

await program.parseAsync();
