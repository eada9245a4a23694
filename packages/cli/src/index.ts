#!/usr/bin/env node

/**
 * seqgen CLI - integer sequences from compact expressions
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { evalCommand } from './commands/eval.js';
import { tokensCommand } from './commands/tokens.js';

const program = new Command();

program.name('seqgen').description('Generate and check integer sequence expressions').version('0.1.0');

// Register commands
program.addCommand(evalCommand);
program.addCommand(tokensCommand);
program.addCommand(checkCommand);

// Parse arguments
await program.parseAsync();
