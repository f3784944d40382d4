/**
 * Recent Files
 *
 * Pure list operations behind the persisted recent-files list. Paths are
 * stored absolute; two entries naming the same file collapse into one.
 */

import * as path from 'path';

export const MAX_RECENT_FILES = 10;

/**
 * Key used to compare paths. Windows paths compare case-insensitively.
 */
export function recentFileKey(filePath: string, platform: NodeJS.Platform = process.platform): string {
  const resolved = platform === 'win32' ? path.win32.resolve(filePath) : path.posix.resolve(filePath);
  return platform === 'win32' ? resolved.toLowerCase() : resolved;
}

/**
 * Put a file at the front of the list, dropping older duplicates and
 * anything past the limit.
 */
export function addRecentFile(
  list: readonly string[],
  filePath: string,
  platform: NodeJS.Platform = process.platform,
  limit: number = MAX_RECENT_FILES
): string[] {
  const resolved = platform === 'win32' ? path.win32.resolve(filePath) : path.posix.resolve(filePath);
  const key = recentFileKey(resolved, platform);
  const rest = list.filter((entry) => recentFileKey(entry, platform) !== key);
  return [resolved, ...rest].slice(0, limit);
}

export function removeRecentFile(
  list: readonly string[],
  filePath: string,
  platform: NodeJS.Platform = process.platform
): string[] {
  const key = recentFileKey(filePath, platform);
  return list.filter((entry) => recentFileKey(entry, platform) !== key);
}

/**
 * Clean up a list read from disk: keep strings only, de-duplicate, cap.
 */
export function normalizeRecentFiles(
  value: unknown,
  platform: NodeJS.Platform = process.platform,
  limit: number = MAX_RECENT_FILES
): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const entries: unknown[] = value;
  const seen = new Set<string>();
  const result: string[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'string' || entry.trim() === '') continue;
    const key = recentFileKey(entry, platform);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(entry);
  }
  return result.slice(0, limit);
}
