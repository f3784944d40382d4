/**
 * useLogWatcher Hook
 *
 * Owns a LogWatcher and a RecordBuffer for the lifetime of the viewer and
 * exposes their state to React. Records can arrive far faster than the
 * terminal redraws, so renders are coalesced on a short timer.
 */

import { useState, useEffect, useCallback, useMemo, useRef } from 'react';
import {
  emptyLogFile,
  FilterState,
  LogRecord,
  LogWatcher,
  RecordBuffer,
  Severity,
  SeverityFilter,
  WatchStats,
} from '../../../tail/index.js';
import { getLogger } from '../../../logging/index.js';
import type { ViewerMessage } from '../state.js';

const logger = getLogger('viewer');

/** Minimum time between redraws caused by new records */
const RENDER_THROTTLE_MS = 100;

const NO_STATS: WatchStats = { polls: 0, delivered: 0, filtered: 0, errors: 0, listenerErrors: 0 };

export interface UseLogWatcherOptions {
  filePath: string;
  pollIntervalMs: number;
  bufferSize: number;
  idleFlushMs: number;
  levels: Severity[];
  fromEnd: boolean;
}

export interface UseLogWatcherResult {
  /** Buffered records that pass the current filter */
  records: LogRecord[];
  /** All buffered records, hidden or not */
  total: number;
  filterState: FilterState;
  running: boolean;
  stats: WatchStats;
  /** Latest notice from the watcher */
  notice: ViewerMessage | null;
  toggleWatching: () => Promise<void>;
  toggleSeverity: (severity: Severity) => void;
  setAllSeverities: (enabled: boolean) => void;
  clearDisplay: () => void;
  emptyFile: () => Promise<void>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Hook for watching one log file
 */
export function useLogWatcher(options: UseLogWatcherOptions): UseLogWatcherResult {
  const { filePath, pollIntervalMs, bufferSize, idleFlushMs, levels, fromEnd } = options;

  const bufferRef = useRef<RecordBuffer>(new RecordBuffer(bufferSize));
  const filterRef = useRef<SeverityFilter>(new SeverityFilter(levels));
  const watcherRef = useRef<LogWatcher | null>(null);
  const renderTimerRef = useRef<ReturnType<typeof setTimeout> | null>(null);

  const [version, setVersion] = useState(0);
  const [filterState, setFilterState] = useState<FilterState>(() => filterRef.current.snapshot());
  const [running, setRunning] = useState(false);
  const [notice, setNotice] = useState<ViewerMessage | null>(null);

  const scheduleRender = useCallback(() => {
    if (renderTimerRef.current) return;
    renderTimerRef.current = setTimeout(() => {
      renderTimerRef.current = null;
      setVersion((v) => v + 1);
    }, RENDER_THROTTLE_MS);
  }, []);

  const start = useCallback(async () => {
    const watcher = watcherRef.current;
    if (!watcher || watcher.isRunning()) return;
    // A restart reads from the start position again
    bufferRef.current.clear();
    setVersion((v) => v + 1);
    try {
      await watcher.start(filePath);
    } catch (error) {
      setNotice({ text: describeError(error), type: 'error' });
    }
  }, [filePath]);

  const stop = useCallback(async () => {
    await watcherRef.current?.stop();
  }, []);

  // Create the watcher once per file and start it
  useEffect(() => {
    const buffer = bufferRef.current;
    const filter = filterRef.current;
    const watcher = new LogWatcher({
      pollIntervalMs,
      idleFlushMs,
      startAt: fromEnd ? 'end' : 'beginning',
      filter,
    });
    watcherRef.current = watcher;

    const onRecord = (record: LogRecord) => {
      buffer.add(record);
      scheduleRender();
    };
    const onFilterChange = (state: FilterState) => setFilterState(state);

    watcher.on('record', onRecord);
    watcher.on('started', () => setRunning(true));
    watcher.on('stopped', () => {
      setRunning(false);
      setVersion((v) => v + 1);
    });
    watcher.on('truncated', (info) =>
      setNotice({ text: `File truncated to ${info.size} bytes`, type: 'warning' })
    );
    watcher.on('replaced', () => setNotice({ text: 'File replaced, reading the new file', type: 'warning' }));
    watcher.on('error', (error) => setNotice({ text: error.message, type: 'error' }));
    watcher.on('missing', (error) => setNotice({ text: error.message, type: 'error' }));
    filter.on('change', onFilterChange);

    watcher.start(filePath).catch((error: unknown) => {
      setNotice({ text: describeError(error), type: 'error' });
    });

    return () => {
      filter.off('change', onFilterChange);
      if (renderTimerRef.current) {
        clearTimeout(renderTimerRef.current);
        renderTimerRef.current = null;
      }
      watcher
        .stop()
        .then(() => watcher.removeAllListeners())
        .catch((error: unknown) => logger.error('Failed to stop watcher', error instanceof Error ? error : undefined));
      watcherRef.current = null;
    };
  }, [filePath, pollIntervalMs, idleFlushMs, fromEnd, scheduleRender]);

  const toggleWatching = useCallback(async () => {
    if (watcherRef.current?.isRunning()) {
      await stop();
      setNotice({ text: 'Watching stopped', type: 'info' });
    } else {
      await start();
    }
  }, [start, stop]);

  const toggleSeverity = useCallback((severity: Severity) => {
    filterRef.current.toggle(severity);
  }, []);

  const setAllSeverities = useCallback((enabled: boolean) => {
    filterRef.current.setAll(enabled);
  }, []);

  const clearDisplay = useCallback(() => {
    bufferRef.current.clear();
    setVersion((v) => v + 1);
  }, []);

  const emptyFile = useCallback(async () => {
    try {
      await emptyLogFile(filePath);
      bufferRef.current.clear();
      setVersion((v) => v + 1);
      setNotice({ text: 'Log file has been emptied', type: 'success' });
    } catch (error) {
      setNotice({ text: `Failed to empty log file: ${describeError(error)}`, type: 'error' });
    }
  }, [filePath]);

  // version is the redraw signal for buffer contents
  const records = useMemo(() => bufferRef.current.getVisible(filterState), [version, filterState]);
  const stats = watcherRef.current?.getStats() ?? NO_STATS;

  return {
    records,
    total: bufferRef.current.size(),
    filterState,
    running,
    stats,
    notice,
    toggleWatching,
    toggleSeverity,
    setAllSeverities,
    clearDisplay,
    emptyFile,
  };
}
