/**
 * Tail Session
 *
 * One watched file: the cursor, the segmenter's pending entry and one
 * iteration of detect → read → segment → parse → filter. The session owns
 * all of its state; only the SeverityFilter is shared with the consumer.
 */

import * as fs from 'fs/promises';
import { getLogger, registerComponent } from '../logging/index.js';
import { ChangeDetector, ChangeEvent } from './ChangeDetector.js';
import { EntrySegmenter } from './EntrySegmenter.js';
import { parseEntry } from './EntryParser.js';
import { toTailError } from './errors.js';
import { IncrementalReader } from './IncrementalReader.js';
import type { LogRecord } from './LogRecord.js';
import { SeverityFilter } from './SeverityFilter.js';
import { createWatchCursor, fileIdentityOf, WatchCursor } from './WatchCursor.js';

registerComponent('tail-session', 'Change detection, reading and segmentation');
const logger = getLogger('tail-session');

/**
 * Where a new session starts reading. 'end' skips what is already there.
 */
export type StartPosition = 'beginning' | 'end';

export interface TailSessionOptions {
  startAt?: StartPosition;
  maxReadBytes?: number;
  headerPattern?: RegExp;
  /**
   * Flush a pending, newline-terminated entry once the file has not
   * changed for this long. 0 disables idle flushing.
   */
  idleFlushMs?: number;
  filter?: SeverityFilter;
  detector?: ChangeDetector;
  /** Clock for idle flushing */
  now?: () => number;
}

export interface PollResult {
  change: ChangeEvent;
  /** Last entry of a rotated-away file, delivered ahead of the change */
  previous: LogRecord[];
  /** Records that passed the filter, in file order */
  records: LogRecord[];
  /** Records parsed but rejected by the filter */
  filtered: number;
  bytesRead: number;
}

export class TailSession {
  private readonly reader: IncrementalReader;
  private readonly segmenter: EntrySegmenter;
  private readonly detector: ChangeDetector;
  private readonly filter: SeverityFilter;
  private readonly idleFlushMs: number;
  private readonly now: () => number;
  private lastChangeAt: number;
  /** Entries completed by a rotation, held until the new file is read */
  private rotated: string[] = [];

  private constructor(
    private readonly cursor: WatchCursor,
    options: TailSessionOptions
  ) {
    this.reader = new IncrementalReader({ maxReadBytes: options.maxReadBytes });
    this.segmenter = new EntrySegmenter({ headerPattern: options.headerPattern });
    this.detector = options.detector ?? new ChangeDetector();
    this.filter = options.filter ?? new SeverityFilter();
    this.idleFlushMs = options.idleFlushMs ?? 0;
    this.now = options.now ?? Date.now;
    this.lastChangeAt = this.now();
  }

  /**
   * Open a session on an existing file. Rejects with FileNotFoundError
   * when the path does not exist.
   */
  static async open(filePath: string, options: TailSessionOptions = {}): Promise<TailSession> {
    let identity: string;
    let size: number;
    try {
      const stats = await fs.stat(filePath);
      identity = fileIdentityOf(stats);
      size = stats.size;
    } catch (error) {
      throw toTailError(filePath, error);
    }

    const offset = options.startAt === 'end' ? size : 0;
    logger.debug(`Opened ${filePath} at offset ${offset}`, { size, identity });
    return new TailSession(createWatchCursor(filePath, identity, offset), options);
  }

  get filePath(): string {
    return this.cursor.filePath;
  }

  /**
   * Snapshot of the cursor, for display and tests.
   */
  getCursor(): Readonly<WatchCursor> {
    return { ...this.cursor };
  }

  getFilter(): SeverityFilter {
    return this.filter;
  }

  hasPending(): boolean {
    return this.rotated.length > 0 || this.segmenter.hasPending();
  }

  /**
   * Run one detect/read/parse iteration. Filesystem failures propagate
   * as FileNotFoundError or TransientIOError. A failed read leaves the
   * offset where it was, or at 0 when the file had just been rewound.
   */
  async poll(): Promise<PollResult> {
    const change = await this.detector.poll(this.cursor);

    if (change.type === 'unchanged') {
      return { change, previous: [], ...this.flushIfIdle(), bytesRead: 0 };
    }

    if (change.type === 'truncated') {
      logger.info(`${this.cursor.filePath} truncated to ${change.size} bytes`);
      this.reader.reset(this.cursor);
      this.segmenter.reset();
    } else if (change.type === 'replaced') {
      logger.info(`${this.cursor.filePath} replaced by a new file (${change.size} bytes)`);
      this.rotated.push(...this.segmenter.flushTerminated());
      this.reader.reset(this.cursor, change.fileIdentity);
    }

    const bytes = await this.reader.readNewBytes(this.cursor, change.size);
    this.lastChangeAt = this.now();
    logger.trace(`Read ${bytes.length} bytes, offset now ${this.cursor.offset}`);

    const previous = this.deliver(this.takeRotated());
    const current = this.deliver(this.segmenter.feed(bytes));
    return {
      change,
      previous: previous.records,
      records: current.records,
      filtered: previous.filtered + current.filtered,
      bytesRead: bytes.length,
    };
  }

  /**
   * Emit the pending entry regardless of completeness.
   */
  flush(): { records: LogRecord[]; filtered: number } {
    return this.deliver([...this.takeRotated(), ...this.segmenter.flush()]);
  }

  private takeRotated(): string[] {
    const segments = this.rotated;
    this.rotated = [];
    return segments;
  }

  private flushIfIdle(): { records: LogRecord[]; filtered: number } {
    if (
      this.idleFlushMs > 0 &&
      this.segmenter.isPendingLineComplete() &&
      this.now() - this.lastChangeAt >= this.idleFlushMs
    ) {
      logger.trace('File idle, flushing pending entry');
      return this.flush();
    }
    return { records: [], filtered: 0 };
  }

  private deliver(segments: string[]): { records: LogRecord[]; filtered: number } {
    const records: LogRecord[] = [];
    let filtered = 0;

    for (const segment of segments) {
      const record = parseEntry(segment);
      if (this.filter.accepts(record)) {
        records.push(record);
      } else {
        filtered++;
      }
    }

    return { records, filtered };
  }
}
