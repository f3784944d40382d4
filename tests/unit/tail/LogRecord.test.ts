import { describe, it, expect } from '@jest/globals';
import { createLogRecord, formatRecordDetails, serializeLogRecord } from '../../../src/tail/LogRecord.js';
import { Severity } from '../../../src/tail/Severity.js';

describe('LogRecord', () => {
  it('should fill defaults', () => {
    const record = createLogRecord({ summary: 'x', rawText: 'x\n' });

    expect(record.timestamp).toBeNull();
    expect(record.severity).toBe(Severity.UNKNOWN);
    expect(record.body).toEqual([]);
    expect(record.payloadKind).toBe('none');
  });

  it('should serialize structured context only', () => {
    const structured = createLogRecord({
      timestamp: new Date(Date.UTC(2024, 0, 1, 10, 0, 0)),
      timestampText: '2024-01-01 10:00:00',
      severity: Severity.ERROR,
      channel: 'local',
      summary: 'failed',
      payloadKind: 'structured',
      context: { id: 1 },
      rawText: '',
    });

    expect(serializeLogRecord(structured)).toEqual({
      timestamp: '2024-01-01T10:00:00.000Z',
      timestampText: '2024-01-01 10:00:00',
      severity: 'error',
      channel: 'local',
      summary: 'failed',
      body: [],
      payloadKind: 'structured',
      context: { id: 1 },
      exception: null,
    });

    const plain = createLogRecord({ summary: 'x', context: { ignored: true }, rawText: '' });
    expect(serializeLogRecord(plain)).not.toHaveProperty('context');
  });

  describe('formatRecordDetails', () => {
    it('should pretty-print structured context', () => {
      const record = createLogRecord({ summary: 's', payloadKind: 'structured', context: { a: 1 }, rawText: '' });
      expect(formatRecordDetails(record)).toBe('{\n  "a": 1\n}');
    });

    it('should join body lines', () => {
      const record = createLogRecord({ summary: 's', body: ['#0 a', '#1 b'], payloadKind: 'stacktrace', rawText: '' });
      expect(formatRecordDetails(record)).toBe('#0 a\n#1 b');
    });

    it('should fall back to the summary', () => {
      expect(formatRecordDetails(createLogRecord({ summary: 'only', rawText: '' }))).toBe('only');
    });
  });
});
