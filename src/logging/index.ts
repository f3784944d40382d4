/**
 * Logging
 *
 * winston-backed component loggers with per-component level overrides.
 */

export { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';
export { Logger } from './Logger.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export type { LoggingOptions } from './LoggerFactory.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  getRegisteredComponents,
  resetDebugRegistry,
} from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration, LogFormat, TimestampFormat } from './config.js';
export { ConsoleTransport, FileTransport, formatLocalTimestamp } from './transports.js';
export type { LogTransport, FileRotation } from './transports.js';
