#!/usr/bin/env node
import { Command } from 'commander';
import { SemantixError } from '@semantix/shared';
import { configCommand } from '../src/commands/config.js';
import { indexCommand } from '../src/commands/index.js';
import { queryCommand } from '../src/commands/query.js';
import { askCommand } from '../src/commands/ask.js';
import { setupCommand } from '../src/commands/setup.js';

const program = new Command();

program
  .name('semantix')
  .description('Semantic values answered by pluggable reasoning backends')
  .version('0.3.0');

program.addCommand(configCommand);
program.addCommand(indexCommand);
program.addCommand(queryCommand);
program.addCommand(askCommand);
program.addCommand(setupCommand);

try {
  await program.parseAsync();
} catch (err) {
  if (!(err instanceof SemantixError)) throw err;
  console.error(err.message);
  process.exitCode = 1;
}
