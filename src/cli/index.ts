#!/usr/bin/env node

/**
 * docsmith CLI
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { checkCommand } from './commands/check.js';
import { finalizeCommand } from './commands/finalize.js';

const program = new Command();

program
  .name('docsmith')
  .description('Generate structured docstrings for Python source files')
  .version('0.1.0');

// Register commands
program.addCommand(generateCommand);
program.addCommand(checkCommand);
program.addCommand(finalizeCommand);

program.parse(process.argv);
