/**
 * Log Watcher
 *
 * Runs a TailSession on a fixed interval and pushes accepted records to
 * listeners, one 'record' event per entry, in file order.
 *
 * The loop is a single async chain: poll, then an abortable sleep. Two
 * polls never overlap, and stop() cuts the sleep short, waits for the poll
 * in flight, flushes the pending entry and only then emits 'stopped'.
 */

import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import { getLogger, registerComponent } from '../logging/index.js';
import { FileNotFoundError, TailError, TransientIOError } from './errors.js';
import type { LogRecord } from './LogRecord.js';
import type { Severity } from './Severity.js';
import { SeverityFilter } from './SeverityFilter.js';
import { TailSession, TailSessionOptions } from './TailSession.js';
import type { WatchCursor } from './WatchCursor.js';

registerComponent('log-watcher', 'Polling loop and record delivery');
const logger = getLogger('log-watcher');

export const DEFAULT_POLL_INTERVAL_MS = 500;
export const MIN_POLL_INTERVAL_MS = 50;
export const MAX_POLL_INTERVAL_MS = 60000;

export interface FileChangeInfo {
  filePath: string;
  size: number;
}

/**
 * Events emitted by the log watcher
 */
export interface LogWatcherEvents {
  started: (filePath: string) => void;
  record: (record: LogRecord) => void;
  truncated: (info: FileChangeInfo) => void;
  replaced: (info: FileChangeInfo) => void;
  /** Transient failure; the watch keeps going */
  error: (error: TailError) => void;
  /** The file is gone; the watch has stopped */
  missing: (error: FileNotFoundError) => void;
  stopped: (filePath: string) => void;
}

export interface LogWatcherOptions extends Omit<TailSessionOptions, 'filter'> {
  pollIntervalMs?: number;
  filter?: SeverityFilter;
}

export interface WatchStats {
  polls: number;
  delivered: number;
  filtered: number;
  /** Transient I/O failures */
  errors: number;
  /** Exceptions thrown by 'record' listeners */
  listenerErrors: number;
}

export declare interface LogWatcher {
  on<K extends keyof LogWatcherEvents>(event: K, listener: LogWatcherEvents[K]): this;
  once<K extends keyof LogWatcherEvents>(event: K, listener: LogWatcherEvents[K]): this;
  off<K extends keyof LogWatcherEvents>(event: K, listener: LogWatcherEvents[K]): this;
  emit<K extends keyof LogWatcherEvents>(event: K, ...args: Parameters<LogWatcherEvents[K]>): boolean;
}

export class LogWatcher extends EventEmitter {
  private readonly filter: SeverityFilter;
  private readonly pollIntervalMs: number;
  private readonly sessionOptions: Omit<TailSessionOptions, 'filter'>;

  private session: TailSession | null = null;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private starting: Promise<void> | null = null;
  private stats: WatchStats = emptyStats();

  constructor(options: LogWatcherOptions = {}) {
    super();
    const { pollIntervalMs, filter, ...sessionOptions } = options;
    this.filter = filter ?? new SeverityFilter();
    this.pollIntervalMs = clampInterval(pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
    this.sessionOptions = sessionOptions;
  }

  /**
   * Begin watching a file. A no-op while a watch is already running;
   * stop first to switch files. Rejects with FileNotFoundError when the
   * file does not exist.
   */
  async start(filePath: string): Promise<void> {
    if (this.loop) {
      if (this.session && this.session.filePath !== filePath) {
        logger.warn(`Already watching ${this.session.filePath}, ignoring start for ${filePath}`);
      }
      return;
    }
    if (this.starting) {
      return this.starting;
    }

    this.starting = this.begin(filePath);
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  /**
   * Stop watching. Resolves once the in-flight poll has finished and the
   * pending entry has been delivered. Safe to call when idle.
   */
  async stop(): Promise<void> {
    if (this.starting) {
      // The start() caller receives the rejection itself
      await this.starting.catch((error: unknown) => {
        logger.debug(`Start failed while stopping: ${String(error)}`);
      });
    }
    if (!this.loop) {
      return;
    }
    this.controller?.abort();
    await this.loop;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  getFilePath(): string | null {
    return this.session?.filePath ?? null;
  }

  getCursor(): Readonly<WatchCursor> | null {
    return this.session?.getCursor() ?? null;
  }

  getFilter(): SeverityFilter {
    return this.filter;
  }

  getStats(): Readonly<WatchStats> {
    return { ...this.stats };
  }

  /**
   * Takes effect from the next record evaluated. Records already
   * delivered are not retracted.
   */
  setSeverityEnabled(severity: Severity, enabled: boolean): void {
    this.filter.setEnabled(severity, enabled);
  }

  private async begin(filePath: string): Promise<void> {
    const session = await TailSession.open(filePath, { ...this.sessionOptions, filter: this.filter });
    const controller = new AbortController();

    this.session = session;
    this.controller = controller;
    this.stats = emptyStats();

    logger.info(`Watching ${filePath} every ${this.pollIntervalMs}ms`);
    this.emit('started', filePath);
    this.loop = this.run(session, controller.signal);
  }

  private async run(session: TailSession, signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        const keepGoing = await this.pollOnce(session);
        if (!keepGoing) break;
        await this.sleep(signal);
      }
      const { records, filtered } = session.flush();
      this.deliver(records, filtered);
    } catch (error) {
      logger.error(`Watch loop for ${session.filePath} failed`, error instanceof Error ? error : undefined);
    }

    this.session = null;
    this.controller = null;
    this.loop = null;
    logger.info(`Stopped watching ${session.filePath}`);
    this.emit('stopped', session.filePath);
  }

  /**
   * One iteration. Returns false when the watch cannot continue.
   */
  private async pollOnce(session: TailSession): Promise<boolean> {
    this.stats.polls++;

    try {
      const result = await session.poll();
      const { change } = result;

      this.deliver(result.previous, 0);
      if (change.type === 'truncated' || change.type === 'replaced') {
        this.emit(change.type, { filePath: session.filePath, size: change.size });
      }
      this.deliver(result.records, result.filtered);
      return true;
    } catch (error) {
      if (error instanceof FileNotFoundError) {
        logger.warn(error.message);
        this.emit('missing', error);
        return false;
      }

      const failure = error instanceof TailError ? error : new TransientIOError(session.filePath, error);
      this.stats.errors++;
      logger.warn(failure.message);
      // An 'error' event without a listener would throw
      if (this.listenerCount('error') > 0) {
        this.emit('error', failure);
      }
      return true;
    }
  }

  /**
   * A listener that throws is logged and skipped; the records after it
   * are still delivered.
   */
  private deliver(records: readonly LogRecord[], filtered: number): void {
    this.stats.filtered += filtered;
    for (const record of records) {
      this.stats.delivered++;
      try {
        this.emit('record', record);
      } catch (error) {
        this.stats.listenerErrors++;
        logger.error(
          `Record listener failed on "${record.summary}"`,
          error instanceof Error ? error : new Error(String(error))
        );
      }
    }
  }

  private async sleep(signal: AbortSignal): Promise<void> {
    try {
      await delay(this.pollIntervalMs, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
    }
  }
}

function emptyStats(): WatchStats {
  return { polls: 0, delivered: 0, filtered: 0, errors: 0, listenerErrors: 0 };
}

/**
 * Keep a poll interval inside the supported range
 */
export function clampInterval(ms: number): number {
  if (!Number.isFinite(ms)) return DEFAULT_POLL_INTERVAL_MS;
  return Math.min(MAX_POLL_INTERVAL_MS, Math.max(MIN_POLL_INTERVAL_MS, Math.round(ms)));
}
