#!/usr/bin/env node
/**
 * laratail CLI
 *
 * Follows a Laravel log file in the terminal.
 *
 * Usage: laratail [options] <command> [arguments]
 *
 * Run `laratail --help` for detailed usage information.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerWatchCommand } from './commands/watch.js';
import { registerParseCommand } from './commands/parse.js';
import { registerEmptyCommand } from './commands/empty.js';
import { registerRecentCommands } from './commands/recent.js';

const VERSION = '0.1.0';

const BANNER = `
${chalk.cyan('  _                _        _ _ ')}
${chalk.cyan(' | | __ _ _ __ __ _| |_ __ _(_) |')}
${chalk.cyan(" | |/ _` | '__/ _` | __/ _` | | |")}
${chalk.cyan(' | | (_| | | | (_| | || (_| | | |')}
${chalk.cyan(' |_|\\__,_|_|  \\__,_|\\__\\__,_|_|_|')}
${chalk.gray('                          v' + VERSION)}
`;

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('laratail')
    .description('Follow a Laravel log file with severity filtering')
    .version(VERSION, '-V, --version', 'Output the version number');

  registerWatchCommand(program);
  registerParseCommand(program);
  registerEmptyCommand(program);
  registerRecentCommands(program);

  program.addHelpText('before', BANNER);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Open the interactive viewer')}
  $ laratail watch storage/logs/laravel.log

  ${chalk.gray('# Stream only errors and worse, as NDJSON')}
  $ laratail watch storage/logs/laravel.log --json --levels emergency,alert,critical,error

  ${chalk.gray('# Reopen the last file you watched')}
  $ laratail watch

  ${chalk.gray('# Count entries per severity')}
  $ laratail parse storage/logs/laravel.log --count

${chalk.bold('Environment:')}
  LARATAIL_POLL_INTERVAL  Poll interval in milliseconds (default 500)
  LARATAIL_BUFFER_SIZE    Records kept by the viewer (default 5000)
  LARATAIL_LEVELS         Severities shown by default
  LOG_LEVEL               Level of laratail's own diagnostics
`
  );

  program.on('command:*', () => {
    console.error(chalk.red('Unknown command:'), program.args.join(' '));
    console.log();
    console.log('Run', chalk.cyan('laratail --help'), 'for usage information.');
    process.exit(1);
  });

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
