/**
 * laratail
 *
 * Library entry point. The CLI lives in src/cli; everything it is built on
 * is exported here for programs that want to follow a log themselves.
 */

export * from './tail/index.js';
export {
  initializeLogging,
  shutdownLogging,
  getLogger,
  setGlobalLevel,
  setComponentLevel,
  LogLevel,
} from './logging/index.js';
export type { LoggingOptions } from './logging/index.js';
