/**
 * Watch Configuration
 *
 * Defaults for `watch` and `parse` come from the environment, validated
 * with zod; command-line flags override them.
 *
 *   LARATAIL_POLL_INTERVAL  poll interval in ms (50-60000, default 500)
 *   LARATAIL_BUFFER_SIZE    records kept by the dashboard (default 5000)
 *   LARATAIL_LEVELS         comma separated severities shown at start
 */

import { z } from 'zod';
import {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_POLL_INTERVAL_MS,
  MAX_POLL_INTERVAL_MS,
  MIN_POLL_INTERVAL_MS,
  parseSeverityList,
  SEVERITY_ORDER,
  Severity,
} from '../../tail/index.js';
import type { WatchCommandOptions, WatchSettings } from '../types/index.js';

/** Idle flush used by the CLI; the engine itself defaults to off */
export const CLI_IDLE_FLUSH_MS = 1000;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const intervalSchema = z.coerce.number().int().min(MIN_POLL_INTERVAL_MS).max(MAX_POLL_INTERVAL_MS);
const bufferSchema = z.coerce.number().int().min(1).max(1_000_000);
const idleFlushSchema = z.coerce.number().int().min(0).max(3_600_000);

const levelsSchema = z.string().transform((value, ctx): Severity[] => {
  const { severities, invalid } = parseSeverityList(value);
  if (invalid.length > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown severity: ${invalid.join(', ')} (expected ${SEVERITY_ORDER.join(', ')})`,
    });
    return z.NEVER;
  }
  return severities;
});

const envSchema = z.object({
  LARATAIL_POLL_INTERVAL: intervalSchema.default(DEFAULT_POLL_INTERVAL_MS),
  LARATAIL_BUFFER_SIZE: bufferSchema.default(DEFAULT_BUFFER_SIZE),
  LARATAIL_LEVELS: levelsSchema.optional(),
});

/**
 * Read watch defaults from the environment. Throws ConfigError naming the
 * offending variable.
 */
export function loadWatchDefaults(env: NodeJS.ProcessEnv = process.env): WatchSettings {
  const parsed = envSchema.safeParse({
    LARATAIL_POLL_INTERVAL: emptyToUndefined(env['LARATAIL_POLL_INTERVAL']),
    LARATAIL_BUFFER_SIZE: emptyToUndefined(env['LARATAIL_BUFFER_SIZE']),
    LARATAIL_LEVELS: emptyToUndefined(env['LARATAIL_LEVELS']),
  });

  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }

  return {
    pollIntervalMs: parsed.data.LARATAIL_POLL_INTERVAL,
    bufferSize: parsed.data.LARATAIL_BUFFER_SIZE,
    idleFlushMs: CLI_IDLE_FLUSH_MS,
    levels: parsed.data.LARATAIL_LEVELS ?? [...SEVERITY_ORDER],
    fromEnd: false,
  };
}

/**
 * Apply command-line flags on top of the defaults
 */
export function resolveWatchSettings(
  options: WatchCommandOptions,
  defaults: WatchSettings = loadWatchDefaults()
): WatchSettings {
  return {
    pollIntervalMs: parseFlag('--interval', options.interval, intervalSchema) ?? defaults.pollIntervalMs,
    bufferSize: parseFlag('--buffer', options.buffer, bufferSchema) ?? defaults.bufferSize,
    idleFlushMs: parseFlag('--idle-flush', options.idleFlush, idleFlushSchema) ?? defaults.idleFlushMs,
    levels: parseFlag('--levels', options.levels, levelsSchema) ?? defaults.levels,
    fromEnd: options.fromEnd ?? defaults.fromEnd,
  };
}

function parseFlag<T>(flag: string, value: string | undefined, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`${flag}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  return parsed.data;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}
