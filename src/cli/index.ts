#!/usr/bin/env node
// Safety review CLI

import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerDiffCommand } from './commands/diff.js';
import { registerReviewCommands } from './commands/review.js';
import { registerHistoryCommands } from './commands/history.js';

const program = new Command();

program
  .name('safety-review')
  .description('Safety Review Engine - peer and joint reviews of fault trees, FMEAs and requirements')
  .version('0.1.0');

registerInitCommand(program);
registerDiffCommand(program);
registerReviewCommands(program);
registerHistoryCommands(program);

await program.parseAsync();
