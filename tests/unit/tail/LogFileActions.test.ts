import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { emptyLogFile, readLogFile } from '../../../src/tail/LogFileActions.js';
import { FileNotFoundError } from '../../../src/tail/errors.js';
import { SeverityFilter } from '../../../src/tail/SeverityFilter.js';
import { Severity } from '../../../src/tail/Severity.js';
import { entry, makeTempDir, removeTempDir } from '../../helpers/logFiles.js';

describe('LogFileActions', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    file = path.join(dir, 'laravel.log');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('readLogFile', () => {
    it('should return every entry including the last', async () => {
      const content = entry('ERROR', 'a') + entry('INFO', 'b') + '[2024-01-01 10:00:00] local.DEBUG: c';
      await fs.writeFile(file, content);

      const result = await readLogFile(file);

      expect(result.records.map((r) => r.summary)).toEqual(['a', 'b', 'c']);
      expect(result.filtered).toBe(0);
      expect(result.bytesRead).toBe(Buffer.byteLength(content));
    });

    it('should count entries the filter rejects', async () => {
      await fs.writeFile(file, entry('ERROR', 'a') + entry('INFO', 'b') + entry('DEBUG', 'c'));

      const result = await readLogFile(file, { filter: new SeverityFilter([Severity.ERROR]) });

      expect(result.records.map((r) => r.summary)).toEqual(['a']);
      expect(result.filtered).toBe(2);
    });

    it('should return nothing for an empty file', async () => {
      await fs.writeFile(file, '');
      expect(await readLogFile(file)).toEqual({ records: [], filtered: 0, bytesRead: 0 });
    });

    it('should reject for a missing file', async () => {
      await expect(readLogFile(file)).rejects.toBeInstanceOf(FileNotFoundError);
    });
  });

  describe('emptyLogFile', () => {
    it('should truncate to zero bytes', async () => {
      await fs.writeFile(file, entry('ERROR', 'a'));
      await emptyLogFile(file);
      expect((await fs.stat(file)).size).toBe(0);
    });

    it('should reject for a missing file', async () => {
      await expect(emptyLogFile(file)).rejects.toBeInstanceOf(FileNotFoundError);
    });
  });
});
