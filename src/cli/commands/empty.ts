/**
 * Empty Command
 *
 * Truncates a log file to zero bytes after confirmation.
 */

import { Command } from 'commander';
import * as readline from 'readline';
import chalk from 'chalk';
import { emptyLogFile } from '../../tail/index.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import { resolveTargetFile } from '../lib/TargetFile.js';
import { EmptyCommandOptions } from '../types/index.js';

interface EmptyActionOptions extends EmptyCommandOptions {
  recent?: string;
}

/**
 * Prompt for a yes/no answer
 */
function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(isAffirmative(answer));
    });
  });
}

export function isAffirmative(answer: string): boolean {
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}

/**
 * Register empty command
 */
export function registerEmptyCommand(program: Command): void {
  program
    .command('empty [file]')
    .description('Truncate a log file to zero bytes')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('-r, --recent <n>', 'Empty the nth recent file')
    .action(async (file: string | undefined, options: EmptyActionOptions) => {
      const formatter = new OutputFormatter();

      try {
        const filePath = await resolveTargetFile(file, options.recent);

        if (!options.yes) {
          if (!process.stdin.isTTY) {
            formatter.error('Refusing to empty without a terminal; pass --yes');
            process.exitCode = 1;
            return;
          }
          const confirmed = await confirm(
            `${chalk.yellow('Empty')} ${filePath}? The whole log is removed and cannot be restored. [y/N] `
          );
          if (!confirmed) {
            formatter.info('Cancelled');
            return;
          }
        }

        await emptyLogFile(filePath);
        formatter.success(`Emptied ${filePath}`);
      } catch (error) {
        formatter.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      }
    });
}

export default registerEmptyCommand;
