// Command registrations

import type { Command } from 'commander';
import { registerBuildCommand } from './build.js';
import { registerSearchCommands } from './search.js';
import { registerPreviewCommand } from './preview.js';
import { registerChunkCommand } from './chunk.js';
import { registerHeadersCommand } from './headers.js';
import { registerStatsCommand } from './stats.js';

export function registerCommands(program: Command): void {
  registerBuildCommand(program);
  registerSearchCommands(program);
  registerPreviewCommand(program);
  registerChunkCommand(program);
  registerHeadersCommand(program);
  registerStatsCommand(program);
}
