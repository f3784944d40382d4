import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import {
  addRecentFile,
  MAX_RECENT_FILES,
  normalizeRecentFiles,
  recentFileKey,
  removeRecentFile,
} from '../../../../src/cli/lib/RecentFiles.js';

describe('RecentFiles', () => {
  describe('addRecentFile', () => {
    it('should move an existing entry to the front', () => {
      expect(addRecentFile(['/logs/a.log', '/logs/b.log'], '/logs/b.log', 'linux')).toEqual([
        '/logs/b.log',
        '/logs/a.log',
      ]);
    });

    it('should store paths resolved', () => {
      expect(addRecentFile([], 'storage/logs/laravel.log', 'linux')).toEqual([
        path.posix.resolve('storage/logs/laravel.log'),
      ]);
    });

    it('should keep at most ten files', () => {
      const list = Array.from({ length: MAX_RECENT_FILES }, (_, i) => `/logs/${i}.log`);
      const next = addRecentFile(list, '/logs/new.log', 'linux');

      expect(next).toHaveLength(MAX_RECENT_FILES);
      expect(next[0]).toBe('/logs/new.log');
      expect(next).not.toContain('/logs/9.log');
    });

    it('should compare Windows paths without case', () => {
      const next = addRecentFile(['C:\\Logs\\App.log'], 'c:\\logs\\app.log', 'win32');
      expect(next).toHaveLength(1);
      expect(next[0]?.toLowerCase()).toBe('c:\\logs\\app.log');
    });

    it('should compare POSIX paths with case', () => {
      expect(addRecentFile(['/Logs/app.log'], '/logs/app.log', 'linux')).toHaveLength(2);
    });
  });

  it('should remove an entry by path', () => {
    expect(removeRecentFile(['/a.log', '/b.log'], '/x/../a.log', 'linux')).toEqual(['/b.log']);
  });

  it('should normalise paths for comparison', () => {
    expect(recentFileKey('/var/log/../tmp/app.log', 'linux')).toBe('/var/tmp/app.log');
  });

  describe('normalizeRecentFiles', () => {
    it('should ignore anything that is not a list', () => {
      expect(normalizeRecentFiles('oops', 'linux')).toEqual([]);
      expect(normalizeRecentFiles(undefined, 'linux')).toEqual([]);
    });

    it('should drop junk and duplicates', () => {
      expect(normalizeRecentFiles(['/a.log', 3, '', '/a.log', '/b.log', null], 'linux')).toEqual(['/a.log', '/b.log']);
    });
  });
});
