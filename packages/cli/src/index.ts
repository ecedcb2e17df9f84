/**
 * querycheck CLI - validate query documents against a schema
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';

const program = new Command();

program.name('querycheck').description('Validate query documents against a schema').version('0.1.0');

program.addCommand(checkCommand);

await program.parseAsync();
