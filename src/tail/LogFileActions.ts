/**
 * Log File Actions
 *
 * One-shot operations on a log file. A running watch notices an emptied
 * file on its next poll, through the truncation path.
 */

import * as fs from 'fs/promises';
import { toTailError } from './errors.js';
import type { LogRecord } from './LogRecord.js';
import type { SeverityFilter } from './SeverityFilter.js';
import { TailSession } from './TailSession.js';

/**
 * Truncate the log file to zero length. Callers confirm first.
 */
export async function emptyLogFile(filePath: string): Promise<void> {
  try {
    await fs.truncate(filePath, 0);
  } catch (error) {
    throw toTailError(filePath, error);
  }
}

export interface ReadLogFileOptions {
  filter?: SeverityFilter;
  maxReadBytes?: number;
  headerPattern?: RegExp;
}

export interface ReadLogFileResult {
  records: LogRecord[];
  filtered: number;
  bytesRead: number;
}

/**
 * Parse a whole file once, the trailing entry included. Reads until a
 * poll finds nothing new, so a file still being written is read up to
 * the point where it was caught up with.
 */
export async function readLogFile(filePath: string, options: ReadLogFileOptions = {}): Promise<ReadLogFileResult> {
  const session = await TailSession.open(filePath, { ...options, startAt: 'beginning' });
  const records: LogRecord[] = [];
  let filtered = 0;
  let bytesRead = 0;

  for (;;) {
    const result = await session.poll();
    records.push(...result.previous, ...result.records);
    filtered += result.filtered;
    bytesRead += result.bytesRead;
    if (result.bytesRead === 0) break;
  }

  const tail = session.flush();
  records.push(...tail.records);
  filtered += tail.filtered;

  return { records, filtered, bytesRead };
}
