import { describe, it, expect } from '@jest/globals';
import { countBySeverity, formatParseSummary } from '../../../../src/cli/commands/parse.js';
import { isAffirmative } from '../../../../src/cli/commands/empty.js';
import { formatRecentList } from '../../../../src/cli/commands/recent.js';
import { createLogRecord } from '../../../../src/tail/LogRecord.js';
import { Severity } from '../../../../src/tail/Severity.js';

function record(severity: Severity) {
  return createLogRecord({ severity, summary: severity, rawText: '' });
}

describe('commands', () => {
  describe('parse', () => {
    const result = {
      records: [record(Severity.INFO), record(Severity.ERROR), record(Severity.INFO), record(Severity.UNKNOWN)],
      filtered: 1,
      bytesRead: 100,
    };

    it('should count records per severity in severity order', () => {
      expect(countBySeverity(result)).toEqual([
        [Severity.ERROR, 1],
        [Severity.INFO, 2],
        [Severity.UNKNOWN, 1],
      ]);
    });

    it('should summarise a read', () => {
      expect(formatParseSummary(result)).toBe('4 records, 1 filtered, 100 B');
    });
  });

  describe('empty', () => {
    it('should accept y and yes only', () => {
      expect(isAffirmative(' Y ')).toBe(true);
      expect(isAffirmative('yes')).toBe(true);
      expect(isAffirmative('')).toBe(false);
      expect(isAffirmative('no')).toBe(false);
    });
  });

  describe('recent', () => {
    it('should number files with aligned indexes', () => {
      const files = Array.from({ length: 10 }, (_, i) => `/logs/${i}.log`);
      const lines = formatRecentList(files);

      expect(lines[0]).toBe(' 1  /logs/0.log');
      expect(lines[9]).toBe('10  /logs/9.log');
    });
  });
});
