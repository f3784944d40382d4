/**
 * Watch Cursor
 *
 * Read progress into the watched file. Owned by a single TailSession;
 * the file handle itself is never retained between reads.
 */

import type { Stats } from 'fs';

export interface WatchCursor {
  readonly filePath: string;
  /** Bytes already consumed */
  offset: number;
  /** dev:ino of the file the offset refers to */
  fileIdentity: string;
}

/**
 * Identity that survives growth and in-place truncation but changes
 * when a new file is created at the same path.
 *
 * birthtime is not used: where the filesystem lacks it, Node reports
 * ctime instead, which truncation changes.
 */
export function fileIdentityOf(stats: Pick<Stats, 'dev' | 'ino'>): string {
  return `${stats.dev}:${stats.ino}`;
}

export function createWatchCursor(filePath: string, fileIdentity: string, offset = 0): WatchCursor {
  return { filePath, offset, fileIdentity };
}
