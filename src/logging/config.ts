/**
 * Logging Configuration
 *
 * Read from the environment on first use and cached. Values that do not
 * parse fall back to their defaults.
 */

import { z } from 'zod';
import { LogLevel, parseLogLevel } from './LogLevel.js';

export type LogFormat = 'text' | 'json';
export type TimestampFormat = 'local' | 'iso';

export interface LoggingConfiguration {
  /** LOG_LEVEL, default INFO */
  logLevel: LogLevel;
  /** LARATAIL_DEBUG_COMPONENTS, `component[:LEVEL]` entries, comma separated */
  debugComponents: string[];
  /** LOG_FORMAT */
  logFormat: LogFormat;
  /** LOG_FILE; no file transport when unset */
  logFile?: string;
  /** LOG_FILE_MAX_SIZE in bytes, size at which the log file rotates */
  logFileMaxBytes: number;
  /** LOG_FILE_MAX_FILES, rotated files kept */
  logFileMaxFiles: number;
  /** LOG_TIMESTAMP_FORMAT: 'local' is yyyy-MM-dd HH:mm:ss,SSS in local time, 'iso' is ISO-8601 */
  timestampFormat: TimestampFormat;
}

export const DEFAULT_LOG_FILE_MAX_BYTES = 10 * 1024 * 1024;
export const DEFAULT_LOG_FILE_MAX_FILES = 5;

function parseDebugComponents(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().catch(fallback);

const envSchema = z.object({
  LOG_LEVEL: z.string().default('INFO').transform(parseLogLevel),
  LARATAIL_DEBUG_COMPONENTS: z.string().optional().transform(parseDebugComponents),
  LOG_FORMAT: z.enum(['text', 'json']).catch('text'),
  LOG_FILE: z
    .string()
    .optional()
    .transform((value) => value || undefined),
  LOG_FILE_MAX_SIZE: positiveInt(DEFAULT_LOG_FILE_MAX_BYTES),
  LOG_FILE_MAX_FILES: positiveInt(DEFAULT_LOG_FILE_MAX_FILES),
  LOG_TIMESTAMP_FORMAT: z.enum(['local', 'iso']).catch('local'),
});

let cachedConfig: LoggingConfiguration | null = null;

/**
 * Current logging configuration. Use resetLoggingConfig() in tests.
 */
export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  const env = envSchema.parse(process.env);
  cachedConfig = {
    logLevel: env.LOG_LEVEL,
    debugComponents: env.LARATAIL_DEBUG_COMPONENTS,
    logFormat: env.LOG_FORMAT,
    logFile: env.LOG_FILE,
    logFileMaxBytes: env.LOG_FILE_MAX_SIZE,
    logFileMaxFiles: env.LOG_FILE_MAX_FILES,
    timestampFormat: env.LOG_TIMESTAMP_FORMAT,
  };

  return cachedConfig;
}

export function resetLoggingConfig(): void {
  cachedConfig = null;
}
