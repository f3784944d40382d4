/**
 * Log Record
 *
 * One logical log entry, reconstructed from one or more physical lines.
 */

import { Severity } from './Severity.js';

/**
 * What the continuation body holds, so a consumer can pick a renderer.
 */
export type PayloadKind = 'none' | 'structured' | 'stacktrace' | 'text';

export interface LogRecord {
  /** Parsed header time, null when missing or unparseable. A fresh copy on every read. */
  readonly timestamp: Date | null;
  /** Header time exactly as written, without brackets */
  readonly timestampText: string | null;
  readonly severity: Severity;
  /** Token before the level, e.g. "local" in "local.ERROR" */
  readonly channel: string | null;
  /** First-line message text */
  readonly summary: string;
  /** Continuation lines without terminators */
  readonly body: readonly string[];
  readonly payloadKind: PayloadKind;
  /** Parsed JSON context when payloadKind is 'structured', deeply frozen */
  readonly context: unknown;
  /** First line of a structured `exception` field */
  readonly exception: string | null;
  /** Entry text as read from the file, terminators included */
  readonly rawText: string;
}

/**
 * Serializable version for NDJSON output
 */
export interface SerializableLogRecord {
  timestamp: string | null;
  timestampText: string | null;
  severity: string;
  channel: string | null;
  summary: string;
  body: string[];
  payloadKind: PayloadKind;
  context?: unknown;
  exception: string | null;
}

/**
 * Build a frozen record. The body array is copied and frozen too, and the
 * context is frozen in place.
 */
export function createLogRecord(fields: {
  timestamp?: Date | null;
  timestampText?: string | null;
  severity?: Severity;
  channel?: string | null;
  summary: string;
  body?: readonly string[];
  payloadKind?: PayloadKind;
  context?: unknown;
  exception?: string | null;
  rawText: string;
}): LogRecord {
  const time = fields.timestamp ? fields.timestamp.getTime() : null;
  return Object.freeze({
    get timestamp(): Date | null {
      return time === null ? null : new Date(time);
    },
    timestampText: fields.timestampText ?? null,
    severity: fields.severity ?? Severity.UNKNOWN,
    channel: fields.channel ?? null,
    summary: fields.summary,
    body: Object.freeze([...(fields.body ?? [])]),
    payloadKind: fields.payloadKind ?? 'none',
    context: deepFreeze(fields.context),
    exception: fields.exception ?? null,
    rawText: fields.rawText,
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function serializeLogRecord(record: LogRecord): SerializableLogRecord {
  const result: SerializableLogRecord = {
    timestamp: record.timestamp ? record.timestamp.toISOString() : null,
    timestampText: record.timestampText,
    severity: record.severity,
    channel: record.channel,
    summary: record.summary,
    body: [...record.body],
    payloadKind: record.payloadKind,
    exception: record.exception,
  };
  if (record.payloadKind === 'structured') {
    result.context = record.context;
  }
  return result;
}

/**
 * Text for a detail view: pretty JSON for structured payloads,
 * the continuation lines otherwise.
 */
export function formatRecordDetails(record: LogRecord): string {
  if (record.payloadKind === 'structured') {
    return JSON.stringify(record.context, null, 2);
  }
  if (record.body.length > 0) {
    return record.body.join('\n');
  }
  return record.summary;
}
