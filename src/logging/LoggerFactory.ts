/**
 * Logger Factory
 *
 * Builds the root winston logger and caches per-component Logger wrappers.
 *
 * Usage:
 *   import { getLogger, initializeLogging } from '../logging/index.js';
 *
 *   // At startup (optional, lazy-init with defaults otherwise):
 *   initializeLogging({ console: false });
 *
 *   // In any module:
 *   const logger = getLogger('my-component');
 *   logger.info('Watching started');
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston uses lower numbers for higher priority.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
    default:
      return 'info';
  }
}

export interface LoggingOptions {
  /**
   * Write to the console. The interactive dashboard turns this off so log
   * lines do not tear the screen.
   */
  console?: boolean;
  additionalTransports?: LogTransport[];
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem. Safe to call again to reconfigure;
 * existing loggers write to the new root from then on.
 */
export function initializeLogging(options: LoggingOptions = {}): void {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport());
  }

  if (config.logFile) {
    transports.push(
      new FileTransport(config.logFile, config.logFormat, config.timestampFormat, {
        maxBytes: config.logFileMaxBytes,
        maxFiles: config.logFileMaxFiles,
      }).createWinstonTransport()
    );
  }

  for (const t of options.additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }

  rootLogger = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: toWinstonLevel(currentGlobalLevel),
    transports,
    // A logger with no transport at all makes winston complain on every write
    silent: transports.length === 0,
    exitOnError: false,
  });

  setGlobalLevelProvider(() => currentGlobalLevel);

  initFromEnv(config.debugComponents);
}

function ensureInitialized(): winston.Logger {
  if (!rootLogger) {
    initializeLogging();
  }
  if (!rootLogger) {
    throw new Error('Logging failed to initialize');
  }
  return rootLogger;
}

/**
 * Get (or create) a Logger for a named component. Loggers are cached by
 * component name; the root is created with defaults on first write if
 * initializeLogging() was never called.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, ensureInitialized);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
  if (rootLogger) {
    rootLogger.level = toWinstonLevel(level);
  }
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const logger = rootLogger;
  if (!logger) {
    return;
  }
  rootLogger = null;
  await new Promise<void>((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
