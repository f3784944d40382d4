/**
 * Tail engine
 *
 * Change detection, incremental reading, entry reconstruction, parsing,
 * severity filtering and delivery for one Laravel log file.
 */

export { Severity, SEVERITY_ORDER, parseSeverity, parseSeverityList, severityRank } from './Severity.js';
export { createLogRecord, serializeLogRecord, formatRecordDetails } from './LogRecord.js';
export type { LogRecord, PayloadKind, SerializableLogRecord } from './LogRecord.js';
export { TailError, FileNotFoundError, TransientIOError, toTailError } from './errors.js';
export { createWatchCursor, fileIdentityOf } from './WatchCursor.js';
export type { WatchCursor } from './WatchCursor.js';
export { ChangeDetector, classifyChange } from './ChangeDetector.js';
export type { ChangeEvent, StatFn } from './ChangeDetector.js';
export { IncrementalReader, DEFAULT_MAX_READ_BYTES } from './IncrementalReader.js';
export { EntrySegmenter, DEFAULT_HEADER_PATTERN } from './EntrySegmenter.js';
export { parseEntry, parseTimestamp, splitLines } from './EntryParser.js';
export { SeverityFilter, accept, allSeverities } from './SeverityFilter.js';
export type { FilterState } from './SeverityFilter.js';
export { TailSession } from './TailSession.js';
export type { TailSessionOptions, PollResult, StartPosition } from './TailSession.js';
export {
  LogWatcher,
  DEFAULT_POLL_INTERVAL_MS,
  MIN_POLL_INTERVAL_MS,
  MAX_POLL_INTERVAL_MS,
  clampInterval,
} from './LogWatcher.js';
export type { LogWatcherEvents, LogWatcherOptions, WatchStats, FileChangeInfo } from './LogWatcher.js';
export { RecordBuffer, DEFAULT_BUFFER_SIZE } from './RecordBuffer.js';
export { emptyLogFile, readLogFile } from './LogFileActions.js';
export type { ReadLogFileOptions, ReadLogFileResult } from './LogFileActions.js';
