#!/usr/bin/env node

/**
 * subsweep CLI entry point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { activeCommand } from './commands/active.js';
import { passiveCommand } from './commands/passive.js';

const program = new Command();

program
  .name('subsweep')
  .description('Active and passive subdomain enumeration with takeover detection')
  .version('1.0.0');

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('subsweep')} ${chalk.gray('v1.0.0')}                              ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('Subdomain discovery over DNS')}                 ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

program.addCommand(activeCommand);
program.addCommand(passiveCommand);

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
    // help, version and usage errors are already printed by commander
    process.exit(error.exitCode);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`\n✘ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}
