/**
 * Recent Commands
 *
 * Lists and edits the recently opened log files.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigManager } from '../lib/ConfigManager.js';
import { formatJson, OutputFormatter } from '../lib/OutputFormatter.js';

interface RecentListOptions {
  json?: boolean;
}

/**
 * Numbered listing, newest first
 */
export function formatRecentList(files: string[]): string[] {
  const width = String(files.length).length;
  return files.map((file, index) => `${String(index + 1).padStart(width)}  ${file}`);
}

/**
 * Register recent commands
 */
export function registerRecentCommands(program: Command): void {
  const recentCmd = program
    .command('recent')
    .description('Show recently opened log files')
    .option('--json', 'Output as JSON')
    .action((options: RecentListOptions) => {
      const files = ConfigManager.getRecentFiles();

      if (options.json) {
        console.log(formatJson(files));
        return;
      }

      if (files.length === 0) {
        console.log(chalk.gray('No recent files'));
        return;
      }

      for (const line of formatRecentList(files)) {
        console.log(line);
      }
      console.log();
      console.log(chalk.gray(`Open one with: laratail watch --recent <n>`));
    });

  recentCmd
    .command('remove <file>')
    .description('Forget one file')
    .action((file: string) => {
      const formatter = new OutputFormatter();
      const before = ConfigManager.getRecentFiles().length;
      const after = ConfigManager.removeRecentFile(file).length;
      if (after === before) {
        formatter.warn(`Not in the recent list: ${file}`);
        return;
      }
      formatter.success(`Removed ${file}`);
    });

  recentCmd
    .command('clear')
    .description('Forget all recent files')
    .action(() => {
      ConfigManager.clearRecentFiles();
      new OutputFormatter().success(`Cleared recent files (${ConfigManager.getPath()})`);
    });
}

export default registerRecentCommands;
