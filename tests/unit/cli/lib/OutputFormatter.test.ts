import { describe, it, expect, beforeAll, afterAll, afterEach, jest } from '@jest/globals';
import chalk from 'chalk';
import {
  formatBytes,
  formatRecordBlock,
  formatRecordJson,
  formatRecordLine,
  formatRecordTime,
  formatSeverityLabel,
  OutputFormatter,
  pad,
  truncate,
} from '../../../../src/cli/lib/OutputFormatter.js';
import { createLogRecord } from '../../../../src/tail/LogRecord.js';
import { Severity } from '../../../../src/tail/Severity.js';

const boom = createLogRecord({
  timestamp: new Date(2024, 0, 1, 10, 0, 0),
  timestampText: '2024-01-01 10:00:00',
  severity: Severity.ERROR,
  channel: 'local',
  summary: 'boom',
  body: ['#0 /app/a.php(1): run()', '#1 {main}'],
  payloadKind: 'stacktrace',
  rawText: '',
});

describe('OutputFormatter', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  describe('helpers', () => {
    it('should format byte counts', () => {
      expect(formatBytes(0)).toBe('0 B');
      expect(formatBytes(100)).toBe('100 B');
      expect(formatBytes(1536)).toBe('1.5 KB');
    });

    it('should truncate and pad', () => {
      expect(truncate('abcdefgh', 6)).toBe('abc...');
      expect(truncate('abc', 6)).toBe('abc');
      expect(pad('ab', 4)).toBe('ab  ');
      expect(pad('ab', 4, 'right')).toBe('  ab');
      expect(pad('abcdef', 4)).toBe('abcd');
    });

    it('should fall back to the raw time text', () => {
      expect(formatRecordTime({ timestamp: null, timestampText: '2024-99-99' })).toBe('2024-99-99');
      expect(formatRecordTime({ timestamp: null, timestampText: null })).toBe('-');
    });

    it('should pad labels to the longest severity', () => {
      expect(formatSeverityLabel(Severity.INFO)).toBe('INFO     ');
      expect(formatSeverityLabel(Severity.EMERGENCY)).toBe('EMERGENCY');
    });
  });

  describe('records', () => {
    it('should render one line per record', () => {
      expect(formatRecordLine(boom)).toBe('2024-01-01 10:00:00 ERROR     local boom');
    });

    it('should append the exception when it differs from the summary', () => {
      const record = createLogRecord({
        timestampText: 'bad',
        severity: Severity.CRITICAL,
        summary: 'Payment failed',
        payloadKind: 'structured',
        context: { exception: 'RuntimeException: declined' },
        exception: 'RuntimeException: declined',
        rawText: '',
      });
      expect(formatRecordLine(record)).toBe('bad CRITICAL  Payment failed (RuntimeException: declined)');
    });

    it('should indent detail lines under the summary', () => {
      expect(formatRecordBlock(boom)).toBe(
        '2024-01-01 10:00:00 ERROR     local boom\n    #0 /app/a.php(1): run()\n    #1 {main}'
      );
    });

    it('should render NDJSON', () => {
      const parsed: unknown = JSON.parse(formatRecordJson(boom));
      expect(parsed).toMatchObject({ severity: 'error', channel: 'local', summary: 'boom', payloadKind: 'stacktrace' });
    });
  });

  describe('OutputFormatter', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should keep diagnostics off stdout', () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const formatter = new OutputFormatter(true);
      formatter.record(boom);
      formatter.error('nope');

      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith(formatRecordJson(boom));
      expect(error).toHaveBeenCalledWith(JSON.stringify({ success: false, error: 'nope' }));
    });

    it('should stay quiet on info in JSON mode', () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      new OutputFormatter(true).info('hello');
      expect(error).not.toHaveBeenCalled();
    });
  });
});
