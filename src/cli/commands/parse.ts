/**
 * Parse Command
 *
 * Reads a whole log file once and prints the records that pass the
 * severity filter.
 */

import { Command } from 'commander';
import ora from 'ora';
import { initializeLogging, shutdownLogging } from '../../logging/index.js';
import { readLogFile, ReadLogFileResult, SeverityFilter, Severity, SEVERITY_ORDER } from '../../tail/index.js';
import { formatBytes, formatNumber, OutputFormatter } from '../lib/OutputFormatter.js';
import { resolveTargetFile } from '../lib/TargetFile.js';
import { loadWatchDefaults, resolveWatchSettings } from '../lib/WatchConfig.js';
import { OutputOptions } from '../types/index.js';

interface ParseActionOptions extends OutputOptions {
  recent?: string;
  count?: boolean;
}

/**
 * Per-severity totals, in severity order, skipping severities with no records
 */
export function countBySeverity(result: ReadLogFileResult): Array<[Severity, number]> {
  const counts = new Map<Severity, number>();
  for (const record of result.records) {
    counts.set(record.severity, (counts.get(record.severity) ?? 0) + 1);
  }
  const order: Severity[] = [...SEVERITY_ORDER, Severity.UNKNOWN];
  return order.flatMap((severity): Array<[Severity, number]> => {
    const count = counts.get(severity);
    return count === undefined ? [] : [[severity, count]];
  });
}

export function formatParseSummary(result: ReadLogFileResult): string {
  const parts = [
    `${formatNumber(result.records.length)} records`,
    `${formatNumber(result.filtered)} filtered`,
    formatBytes(result.bytesRead),
  ];
  return parts.join(', ');
}

/**
 * Register parse command
 */
export function registerParseCommand(program: Command): void {
  program
    .command('parse [file]')
    .alias('p')
    .description('Print every entry of a log file and exit')
    .option('--plain', 'Print formatted text (the default)')
    .option('--json', 'Print records as NDJSON')
    .option('-l, --levels <list>', 'Comma separated severities to show')
    .option('-r, --recent <n>', 'Parse the nth recent file')
    .option('-c, --count', 'Only print totals per severity')
    .action(async (file: string | undefined, options: ParseActionOptions) => {
      const formatter = new OutputFormatter(Boolean(options.json));
      initializeLogging();

      try {
        const settings = resolveWatchSettings({ levels: options.levels }, loadWatchDefaults());
        const filePath = await resolveTargetFile(file, options.recent);

        const spinner = options.json || !process.stderr.isTTY ? null : ora(`Reading ${filePath}`).start();
        let result: ReadLogFileResult;
        try {
          result = await readLogFile(filePath, { filter: new SeverityFilter(settings.levels) });
        } catch (error) {
          spinner?.fail('Read failed');
          throw error;
        }
        spinner?.stop();

        if (options.count) {
          for (const [severity, count] of countBySeverity(result)) {
            console.log(options.json ? JSON.stringify({ severity, count }) : `${severity.padEnd(9)} ${count}`);
          }
        } else {
          for (const record of result.records) {
            formatter.record(record);
          }
        }

        formatter.info(formatParseSummary(result));
      } catch (error) {
        formatter.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      } finally {
        await shutdownLogging();
      }
    });
}

export default registerParseCommand;
