/**
 * Entry Parser
 *
 * Turns the text of one logical entry into a LogRecord. Parsing is pure
 * and total: whatever the input, a record comes out.
 *
 * Header grammar (Monolog LineFormatter as configured by Laravel):
 *
 *   [2024-01-01 10:00:00] local.ERROR: message {"context":"..."} []
 */

import { isValid, parseISO } from 'date-fns';
import { DEFAULT_HEADER_PATTERN } from './EntrySegmenter.js';
import { createLogRecord, LogRecord, PayloadKind } from './LogRecord.js';
import { parseSeverity, Severity } from './Severity.js';

const HEADER_REGEX = /^\[([^\]\n]*)\]\s*(?:([^\s:]+)\.)?([A-Za-z]+):(?:\s(.*))?$/;
const BRACKETED_PREFIX_REGEX = /^\[([^\]\n]*)\]\s?(.*)$/;

/** Trailing empty `[]` blocks Monolog prints for empty context/extra */
const EMPTY_BLOCKS_REGEX = /(?:\s+\[\])+\s*$/;

const STACK_FRAME_PATTERNS: readonly RegExp[] = [
  /^#\d+\s/,
  /^\s+at\s/,
  /^\[stacktrace/i,
  /^Stack trace:/i,
];

/** How many `{` positions in the message are tried as payload starts */
const MAX_PAYLOAD_CANDIDATES = 8;

interface Header {
  timestampText: string;
  channel: string | null;
  levelToken: string | null;
  message: string;
}

/**
 * Parse one raw entry as produced by EntrySegmenter.
 */
export function parseEntry(rawText: string): LogRecord {
  const lines = splitLines(rawText);
  const firstLine = lines[0] ?? '';
  const body = lines.slice(1);
  const header = parseHeader(firstLine);

  if (!header) {
    const payload = extractBodyPayload(firstLine, body);
    return createLogRecord({
      summary: firstLine,
      body,
      payloadKind: payload ? 'structured' : detectUnstructuredKind(body),
      context: payload?.context,
      exception: payload?.exception,
      rawText,
    });
  }

  const severity = header.levelToken !== null ? parseSeverity(header.levelToken) : Severity.UNKNOWN;
  const payload = extractMessagePayload(header.message, body) ?? extractBodyPayload(header.message, body);

  if (payload) {
    return createLogRecord({
      timestamp: parseTimestamp(header.timestampText),
      timestampText: header.timestampText,
      severity,
      channel: header.channel,
      summary: payload.summary,
      body,
      payloadKind: 'structured',
      context: payload.context,
      exception: payload.exception,
      rawText,
    });
  }

  return createLogRecord({
    timestamp: parseTimestamp(header.timestampText),
    timestampText: header.timestampText,
    severity,
    channel: header.channel,
    summary: stripEmptyBlocks(header.message),
    body,
    payloadKind: detectUnstructuredKind(body),
    rawText,
  });
}

/**
 * Split entry text into lines, dropping terminators. One trailing
 * terminator does not produce an empty last line.
 */
export function splitLines(text: string): string[] {
  const trimmed = text.endsWith('\r\n') ? text.slice(0, -2) : text.endsWith('\n') ? text.slice(0, -1) : text;
  return trimmed.split(/\r?\n/);
}

function parseHeader(line: string): Header | null {
  const match = HEADER_REGEX.exec(line);
  // "[time] Note: text" has no channel and no level, only a colon
  if (match && (match[2] !== undefined || parseSeverity(match[3] ?? '') !== Severity.UNKNOWN)) {
    return {
      timestampText: match[1] ?? '',
      channel: match[2] ?? null,
      levelToken: match[3] ?? null,
      message: (match[4] ?? '').replace(/\r$/, ''),
    };
  }

  // Bracketed time but no "channel.LEVEL:" part
  const prefix = BRACKETED_PREFIX_REGEX.exec(line);
  if (prefix && DEFAULT_HEADER_PATTERN.test(line)) {
    return {
      timestampText: prefix[1] ?? '',
      channel: null,
      levelToken: null,
      message: (prefix[2] ?? '').replace(/\r$/, ''),
    };
  }

  return null;
}

/**
 * Parse a header time. Accepts "yyyy-MM-dd HH:mm:ss", the ISO-8601 forms
 * with `T`, fractional seconds and offsets. Returns null when invalid.
 */
export function parseTimestamp(text: string): Date | null {
  const trimmed = text.trim();
  if (trimmed === '') return null;
  const date = parseISO(trimmed);
  return isValid(date) ? date : null;
}

function stripEmptyBlocks(message: string): string {
  const stripped = message.replace(EMPTY_BLOCKS_REGEX, '');
  return stripped.length > 0 ? stripped : message.trimEnd();
}

interface StructuredPayload {
  summary: string;
  context: unknown;
  exception: string | null;
}

/**
 * Find a JSON object that starts inside the header message and runs to the
 * end of the entry. Monolog writes exception traces with raw line breaks
 * inside the JSON string, so a second attempt escapes them.
 */
function extractMessagePayload(message: string, body: readonly string[]): StructuredPayload | null {
  let start = message.indexOf('{');
  let attempts = 0;

  while (start !== -1 && attempts < MAX_PAYLOAD_CANDIDATES) {
    attempts++;
    const candidate = [message.slice(start), ...body].join('\n').replace(EMPTY_BLOCKS_REGEX, '').trimEnd();
    const context = parseJsonLenient(candidate);

    if (context !== undefined) {
      const summary = message.slice(0, start).trimEnd();
      return {
        summary: summary.length > 0 ? summary : stripEmptyBlocks(message),
        context,
        exception: firstExceptionLine(context),
      };
    }

    start = message.indexOf('{', start + 1);
  }

  return null;
}

/**
 * A JSON object on its own lines below the header, from the first line
 * that opens with `{` to the end of the entry.
 */
function extractBodyPayload(message: string, body: readonly string[]): StructuredPayload | null {
  const start = body.findIndex((line) => line.trimStart().startsWith('{'));
  if (start === -1) {
    return null;
  }

  const candidate = body.slice(start).join('\n').replace(EMPTY_BLOCKS_REGEX, '').trim();
  const context = parseJsonLenient(candidate);
  if (context === undefined) {
    return null;
  }

  return {
    summary: stripEmptyBlocks(message),
    context,
    exception: firstExceptionLine(context),
  };
}

function parseJsonLenient(candidate: string): unknown {
  if (!candidate.endsWith('}')) {
    return undefined;
  }

  for (const text of [candidate, escapeLineBreaks(candidate)]) {
    const value = tryParseJson(text);
    if (typeof value === 'object' && value !== null) {
      return value;
    }
  }

  return undefined;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function escapeLineBreaks(text: string): string {
  return text.replace(/\r/g, '\\r').replace(/\n/g, '\\n');
}

function firstExceptionLine(context: unknown): string | null {
  if (typeof context !== 'object' || context === null || !('exception' in context)) {
    return null;
  }
  const exception = context.exception;
  if (typeof exception !== 'string') {
    return null;
  }
  const first = exception.split('\n')[0]?.trim() ?? '';
  return first.length > 0 ? first : null;
}

function detectUnstructuredKind(body: readonly string[]): PayloadKind {
  if (body.length === 0) {
    return 'none';
  }
  if (body.some((line) => STACK_FRAME_PATTERNS.some((pattern) => pattern.test(line)))) {
    return 'stacktrace';
  }
  return 'text';
}
