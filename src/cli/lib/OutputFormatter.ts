/**
 * Output Formatter
 *
 * Provides consistent output formatting for CLI commands.
 * Records print as colored text lines or as NDJSON.
 */

import chalk from 'chalk';
import { format } from 'date-fns';
import {
  formatRecordDetails,
  LogRecord,
  serializeLogRecord,
  Severity,
} from '../../tail/index.js';

// =============================================================================
// Color Helpers
// =============================================================================

type ChalkFn = chalk.Chalk;

/**
 * Get color for a severity
 */
export function getSeverityColor(severity: Severity): ChalkFn {
  switch (severity) {
    case Severity.EMERGENCY:
    case Severity.ALERT:
    case Severity.CRITICAL:
      return chalk.bgRed.white;
    case Severity.ERROR:
      return chalk.red;
    case Severity.WARNING:
      return chalk.yellow;
    case Severity.NOTICE:
      return chalk.cyan;
    case Severity.INFO:
      return chalk.green;
    case Severity.DEBUG:
      return chalk.gray;
    case Severity.UNKNOWN:
    default:
      return chalk.white;
  }
}

// =============================================================================
// Format Helpers
// =============================================================================

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString();
}

/**
 * Truncate string to max length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= 3) return str.slice(0, maxLength);
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Pad string to fixed width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str.slice(0, width);
  const padding = ' '.repeat(width - str.length);
  return align === 'left' ? str + padding : padding + str;
}

/**
 * Record time for display: local time when the header parsed, the raw
 * header text otherwise.
 */
export function formatRecordTime(record: Pick<LogRecord, 'timestamp' | 'timestampText'>): string {
  if (record.timestamp) {
    return format(record.timestamp, 'yyyy-MM-dd HH:mm:ss');
  }
  return record.timestampText ?? '-';
}

/**
 * Severity label, fixed to the width of the longest name
 */
export function formatSeverityLabel(severity: Severity): string {
  return pad(severity.toUpperCase(), 9);
}

// =============================================================================
// Record Formatting
// =============================================================================

/**
 * One-line summary: time, level, channel and message
 */
export function formatRecordLine(record: LogRecord): string {
  const color = getSeverityColor(record.severity);
  const channel = record.channel ? chalk.gray(`${record.channel} `) : '';
  const exception = record.exception && record.exception !== record.summary ? chalk.gray(` (${record.exception})`) : '';
  return `${chalk.gray(formatRecordTime(record))} ${color(formatSeverityLabel(record.severity))} ${channel}${record.summary}${exception}`;
}

/**
 * Summary line followed by the indented detail text, when there is any
 */
export function formatRecordBlock(record: LogRecord): string {
  const lines = [formatRecordLine(record)];
  if (record.payloadKind !== 'none') {
    for (const line of formatRecordDetails(record).split('\n')) {
      lines.push(chalk.gray(`    ${line}`));
    }
  }
  return lines.join('\n');
}

/**
 * One NDJSON line
 */
export function formatRecordJson(record: LogRecord): string {
  return JSON.stringify(serializeLogRecord(record));
}

/**
 * Format any data as pretty JSON
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

// =============================================================================
// Output Helper
// =============================================================================

/**
 * OutputFormatter class for consistent output handling
 */
export class OutputFormatter {
  private jsonMode: boolean;

  constructor(jsonMode: boolean = false) {
    this.jsonMode = jsonMode;
  }

  /**
   * Write one record in the current mode
   */
  record(record: LogRecord): void {
    console.log(this.jsonMode ? formatRecordJson(record) : formatRecordBlock(record));
  }

  /**
   * Output success message
   */
  success(message: string): void {
    if (this.jsonMode) {
      console.log(JSON.stringify({ success: true, message }));
    } else {
      console.log(chalk.green('✔') + ' ' + message);
    }
  }

  /**
   * Output error message. Goes to stderr in both modes so NDJSON on
   * stdout stays parseable.
   */
  error(message: string, details?: unknown): void {
    if (this.jsonMode) {
      console.error(JSON.stringify({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + message);
      if (details) {
        console.error(chalk.gray(formatJson(details)));
      }
    }
  }

  /**
   * Output warning message
   */
  warn(message: string): void {
    if (this.jsonMode) {
      console.error(JSON.stringify({ warning: message }));
    } else {
      console.error(chalk.yellow('⚠') + ' ' + message);
    }
  }

  /**
   * Output info message
   */
  info(message: string): void {
    if (!this.jsonMode) {
      console.error(chalk.blue('ℹ') + ' ' + message);
    }
  }
}

export default OutputFormatter;
