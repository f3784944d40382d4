/**
 * CLI-specific type definitions
 *
 * Option shapes for the commands and the persisted CLI state. The tail
 * engine's own types live in src/tail.
 */

import type { Severity } from '../../tail/index.js';

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * CLI state persisted between runs
 */
export interface CliConfig {
  /** Most recently opened log files, newest first */
  recentFiles: string[];
}

/**
 * Watch defaults after environment and flags are merged
 */
export interface WatchSettings {
  pollIntervalMs: number;
  bufferSize: number;
  idleFlushMs: number;
  levels: Severity[];
  fromEnd: boolean;
}

// =============================================================================
// Command Options
// =============================================================================

/**
 * Output selection shared by `watch` and `parse`
 */
export interface OutputOptions {
  plain?: boolean;
  json?: boolean;
  levels?: string;
}

export interface WatchCommandOptions extends OutputOptions {
  fromEnd?: boolean;
  interval?: string;
  idleFlush?: string;
  buffer?: string;
}

export interface EmptyCommandOptions {
  yes?: boolean;
}

export type OutputMode = 'dashboard' | 'plain' | 'json';
