#!/usr/bin/env node

// Точка входа CLI интерактивного выбора.
import { Command } from 'commander';
import { pickCommand } from './commands/pick-cmd.js';
import { filterCommand } from './commands/filter-cmd.js';

const program = new Command()
  .name('fpick')
  .description('Fuzzy picker for delimited text files')
  .version('0.1.0');

program.addCommand(pickCommand, { isDefault: true });
program.addCommand(filterCommand);

await program.parseAsync();
