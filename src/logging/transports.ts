/**
 * Logging Transports
 *
 * Winston transport wrappers. Text lines look like:
 *   INFO  2026-02-10 14:30:15,042 [log-watcher] Watching /var/log/app.log
 */

import winston from 'winston';
import { format as formatDate } from 'date-fns';
import {
  DEFAULT_LOG_FILE_MAX_BYTES,
  DEFAULT_LOG_FILE_MAX_FILES,
  LogFormat,
  TimestampFormat,
} from './config.js';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * yyyy-MM-dd HH:mm:ss,SSS in local time
 */
export function formatLocalTimestamp(date: Date): string {
  return formatDate(date, 'yyyy-MM-dd HH:mm:ss,SSS');
}

/**
 * Render one winston info object as a text line.
 */
export function formatTextLine(
  info: { level: string; message: unknown; [key: string]: unknown },
  timestampFormat: TimestampFormat,
  now: Date = new Date()
): string {
  const level = info.level.toUpperCase().padEnd(5);
  const component = typeof info['component'] === 'string' ? info['component'] : undefined;
  const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatLocalTimestamp(now);
  const componentPart = component ? ` [${component}]` : '';
  const errorStack = typeof info['errorStack'] === 'string' ? info['errorStack'] : undefined;
  let line = `${level} ${timestamp}${componentPart} ${String(info.message)}`;
  if (errorStack) {
    line += '\n' + errorStack;
  }
  return line;
}

function buildTextFormat(timestampFormat: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => formatTextLine(info, timestampFormat));
}

function buildFormat(format: LogFormat, timestampFormat: TimestampFormat): winston.Logform.Format {
  return format === 'json'
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : buildTextFormat(timestampFormat);
}

/**
 * Console transport. Everything goes to stderr so that stdout stays
 * reserved for the records being tailed.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: LogFormat,
    private timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format, this.timestampFormat),
      stderrLevels: ['error', 'warn', 'info', 'debug', 'trace'],
    });
  }
}

export interface FileRotation {
  maxBytes: number;
  maxFiles: number;
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat,
    private timestampFormat: TimestampFormat = 'local',
    private rotation: FileRotation = { maxBytes: DEFAULT_LOG_FILE_MAX_BYTES, maxFiles: DEFAULT_LOG_FILE_MAX_FILES }
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format, this.timestampFormat),
      maxsize: this.rotation.maxBytes,
      maxFiles: this.rotation.maxFiles,
    });
  }
}
