/**
 * Change Detector
 *
 * Polls size and identity of the watched file. OS change notifications
 * coalesce rapid appends on some filesystems, so a stat per interval is
 * the only signal used.
 *
 * A file rewritten to a length above the old offset between two polls
 * looks like growth; that case cannot be told apart from metadata alone.
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import { toTailError } from './errors.js';
import { fileIdentityOf, type WatchCursor } from './WatchCursor.js';

export type ChangeEvent =
  | { type: 'unchanged'; size: number }
  | { type: 'grown'; bytes: number; size: number }
  | { type: 'truncated'; size: number }
  | { type: 'replaced'; size: number; fileIdentity: string };

export type StatFn = (filePath: string) => Promise<Stats>;

export class ChangeDetector {
  constructor(private readonly statFile: StatFn = (p) => fs.stat(p)) {}

  /**
   * Compare the file's current metadata against the cursor.
   * Throws FileNotFoundError or TransientIOError; never touches the cursor.
   */
  async poll(cursor: WatchCursor): Promise<ChangeEvent> {
    let stats: Stats;
    try {
      stats = await this.statFile(cursor.filePath);
    } catch (error) {
      throw toTailError(cursor.filePath, error);
    }

    return classifyChange(cursor, stats.size, fileIdentityOf(stats));
  }
}

/**
 * Pure classification of one observation against the cursor.
 */
export function classifyChange(cursor: WatchCursor, size: number, fileIdentity: string): ChangeEvent {
  if (fileIdentity !== cursor.fileIdentity) {
    return { type: 'replaced', size, fileIdentity };
  }
  if (size < cursor.offset) {
    return { type: 'truncated', size };
  }
  if (size > cursor.offset) {
    return { type: 'grown', bytes: size - cursor.offset, size };
  }
  return { type: 'unchanged', size };
}
