/**
 * Target File
 *
 * Works out which log file a command operates on: the path given on the
 * command line, or an entry of the recent-files list.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { FileNotFoundError, toTailError } from '../../tail/index.js';
import { ConfigManager } from './ConfigManager.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Store the recent-files list lives in. Injected by tests.
 */
export interface RecentFileStore {
  getRecentFiles(): string[];
  addRecentFile(filePath: string): string[];
  removeRecentFile(filePath: string): string[];
}

async function assertFile(filePath: string): Promise<void> {
  let isFile: boolean;
  try {
    isFile = (await fs.stat(filePath)).isFile();
  } catch (error) {
    throw toTailError(filePath, error);
  }
  if (!isFile) {
    throw new UsageError(`Not a regular file: ${filePath}`);
  }
}

/**
 * Parse a 1-based position in the recent-files list
 */
export function parseRecentIndex(value: string | undefined): number {
  if (value === undefined) return 1;
  const index = Number(value);
  if (!Number.isInteger(index) || index < 1) {
    throw new UsageError(`--recent expects a positive number, got "${value}"`);
  }
  return index;
}

/**
 * Resolve the file to open and record it as recently used. A recent entry
 * whose file has gone is dropped from the list.
 */
export async function resolveTargetFile(
  file: string | undefined,
  recent: string | undefined,
  store: RecentFileStore = ConfigManager
): Promise<string> {
  if (file !== undefined) {
    const resolved = path.resolve(file);
    await assertFile(resolved);
    store.addRecentFile(resolved);
    return resolved;
  }

  const index = parseRecentIndex(recent);
  const files = store.getRecentFiles();
  const chosen = files[index - 1];
  if (chosen === undefined) {
    throw new UsageError(
      files.length === 0
        ? 'No file given and no recent files yet'
        : `There are only ${files.length} recent file(s)`
    );
  }

  try {
    await assertFile(chosen);
  } catch (error) {
    if (error instanceof FileNotFoundError) {
      store.removeRecentFile(chosen);
    }
    throw error;
  }

  store.addRecentFile(chosen);
  return chosen;
}
