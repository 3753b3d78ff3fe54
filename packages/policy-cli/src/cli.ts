#!/usr/bin/env node

/**
 * Tollgate CLI
 *
 * Validate policies, generate middleware and try requests from the command line.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { validateCommand } from './commands/validate.js';
import { generateCommand } from './commands/generate.js';
import { checkCommand } from './commands/check.js';

const program = new Command();

program
  .name('tollgate')
  .description('Tollgate - access and spending policies for machine clients')
  .version('0.1.0');

program.addCommand(validateCommand);
program.addCommand(generateCommand);
program.addCommand(checkCommand);

await program.parseAsync();
