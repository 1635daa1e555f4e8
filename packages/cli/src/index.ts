#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { configCommand, consoleCommand, statusCommand } from './commands/index.js';

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  const program = new Command();

  program
    .name('overseer')
    .description('Overseer - approval and directive console')
    .version('0.1.0');

  consoleCommand(program);
  statusCommand(program);
  configCommand(program);

  program.addHelpText('before', '\n' + chalk.bold.green('  Overseer v0.1.0'));

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});

export { main };
