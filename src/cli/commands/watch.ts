/**
 * Watch Command
 *
 * Follows a log file. On a terminal this opens the interactive viewer;
 * --plain and --json stream records to stdout instead.
 */

import { Command } from 'commander';
import React from 'react';
import { render } from 'ink';
import { initializeLogging, shutdownLogging } from '../../logging/index.js';
import { LogWatcher, SeverityFilter } from '../../tail/index.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import { resolveTargetFile } from '../lib/TargetFile.js';
import { resolveWatchSettings } from '../lib/WatchConfig.js';
import { LogViewer } from '../ui/components/LogViewer.js';
import { OutputMode, WatchCommandOptions, WatchSettings } from '../types/index.js';

interface WatchActionOptions extends WatchCommandOptions {
  recent?: string;
}

/**
 * Pick the output mode from the flags and the terminal
 */
export function selectOutputMode(options: WatchCommandOptions, isTTY: boolean): OutputMode {
  if (options.json) return 'json';
  if (options.plain || !isTTY) return 'plain';
  return 'dashboard';
}

/**
 * Stream records until the file disappears or the process is interrupted
 */
async function streamRecords(filePath: string, settings: WatchSettings, formatter: OutputFormatter): Promise<void> {
  const watcher = new LogWatcher({
    pollIntervalMs: settings.pollIntervalMs,
    idleFlushMs: settings.idleFlushMs,
    startAt: settings.fromEnd ? 'end' : 'beginning',
    filter: new SeverityFilter(settings.levels),
  });

  watcher.on('record', (record) => formatter.record(record));
  watcher.on('truncated', (info) => formatter.warn(`${info.filePath} truncated to ${info.size} bytes`));
  watcher.on('replaced', (info) => formatter.warn(`${info.filePath} replaced, reading the new file`));
  watcher.on('error', (error) => formatter.warn(error.message));
  watcher.on('missing', (error) => {
    formatter.error(error.message);
    process.exitCode = 1;
  });

  const stopped = new Promise<void>((resolve) => watcher.once('stopped', () => resolve()));
  const onSignal = (): void => {
    watcher.stop().catch((error: unknown) => formatter.error(`Failed to stop: ${String(error)}`));
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  try {
    await watcher.start(filePath);
    await stopped;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

/**
 * Register watch command
 */
export function registerWatchCommand(program: Command): void {
  program
    .command('watch [file]')
    .alias('w')
    .description('Follow a log file (opens the most recent file when none is given)')
    .option('--plain', 'Stream formatted lines instead of the interactive viewer')
    .option('--json', 'Stream records as NDJSON')
    .option('-l, --levels <list>', 'Comma separated severities to show, e.g. error,warning')
    .option('--from-end', 'Skip what is already in the file')
    .option('-i, --interval <ms>', 'Poll interval in milliseconds')
    .option('--idle-flush <ms>', 'Emit the last entry after the file is quiet this long (0 = never)')
    .option('-b, --buffer <records>', 'Records kept by the interactive viewer')
    .option('-r, --recent <n>', 'Open the nth recent file')
    .action(async (file: string | undefined, options: WatchActionOptions) => {
      const mode = selectOutputMode(options, Boolean(process.stdout.isTTY));
      const formatter = new OutputFormatter(mode === 'json');

      // The viewer owns the screen; log lines would tear it
      initializeLogging({ console: mode !== 'dashboard' });

      try {
        const settings = resolveWatchSettings(options);
        const filePath = await resolveTargetFile(file, options.recent);

        if (mode === 'dashboard') {
          const { waitUntilExit } = render(
            React.createElement(LogViewer, {
              filePath,
              pollIntervalMs: settings.pollIntervalMs,
              bufferSize: settings.bufferSize,
              idleFlushMs: settings.idleFlushMs,
              levels: settings.levels,
              fromEnd: settings.fromEnd,
            })
          );
          await waitUntilExit();
        } else {
          await streamRecords(filePath, settings, formatter);
        }
      } catch (error) {
        formatter.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      } finally {
        await shutdownLogging();
      }
    });
}

export default registerWatchCommand;
