/**
 * LogViewer Component
 *
 * Main orchestrator for the interactive viewer: record table, detail pane,
 * severity checkboxes and the confirmed "empty log file" action.
 */

import React, { FC, useState, useEffect, useMemo, useRef, useCallback } from 'react';
import { Box, useApp } from 'ink';
import { SEVERITY_ORDER } from '../../../tail/index.js';
import { useLogWatcher, UseLogWatcherOptions } from '../hooks/useLogWatcher.js';
import { KeyboardAction, useKeyboardShortcuts } from '../hooks/useKeyboardShortcuts.js';
import { clampIndex, followSelection, ViewerMessage, ViewMode } from '../state.js';
import { Header } from './Header.js';
import { LogTable } from './LogTable.js';
import { RecordDetail } from './RecordDetail.js';
import { SeverityBar } from './SeverityBar.js';
import { SeverityOverlay } from './SeverityOverlay.js';
import { ConfirmOverlay } from './ConfirmOverlay.js';
import { HelpOverlay } from './HelpOverlay.js';
import { StatusBar } from './StatusBar.js';
import { HelpBar } from './HelpBar.js';

export type LogViewerProps = UseLogWatcherOptions;

/** Lines taken by everything except the table */
const CHROME_HEIGHT = 11;

/**
 * Main LogViewer component
 */
export const LogViewer: FC<LogViewerProps> = (props) => {
  const { exit } = useApp();
  const watch = useLogWatcher(props);
  const { records } = watch;

  const [viewMode, setViewMode] = useState<ViewMode>('table');
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [detailOffset, setDetailOffset] = useState(0);
  const [message, setMessage] = useState<ViewerMessage | null>(null);
  const previousLength = useRef(0);

  const termWidth = process.stdout.columns || 80;
  const termHeight = process.stdout.rows || 24;
  const tableHeight = Math.max(3, termHeight - CHROME_HEIGHT);

  // Follow new rows while the last row is selected
  useEffect(() => {
    setSelectedIndex((index) => followSelection(index, previousLength.current, records.length));
    previousLength.current = records.length;
  }, [records]);

  // Watcher notices replace the current message
  useEffect(() => {
    if (watch.notice) {
      setMessage(watch.notice);
    }
  }, [watch.notice]);

  // Clear message after delay
  useEffect(() => {
    if (message) {
      const timeout = setTimeout(() => setMessage(null), 4000);
      return () => clearTimeout(timeout);
    }
    return undefined;
  }, [message]);

  const selectedRecord = records[clampIndex(selectedIndex, records.length)];

  const move = useCallback(
    (delta: number) => setSelectedIndex((i) => clampIndex(i + delta, records.length)),
    [records.length]
  );

  const reportError = useCallback((error: unknown) => {
    setMessage({ text: error instanceof Error ? error.message : String(error), type: 'error' });
  }, []);

  const actions = useMemo<KeyboardAction[]>(
    () => [
      // Table navigation
      { key: 'up', description: 'Previous', handler: () => move(-1), context: 'table' },
      { key: 'k', description: 'Previous', handler: () => move(-1), context: 'table' },
      { key: 'down', description: 'Next', handler: () => move(1), context: 'table' },
      { key: 'j', description: 'Next', handler: () => move(1), context: 'table' },
      { key: 'pageup', description: 'Page up', handler: () => move(-tableHeight), context: 'table' },
      { key: 'pagedown', description: 'Page down', handler: () => move(tableHeight), context: 'table' },
      { key: 'g', description: 'First', handler: () => setSelectedIndex(0), context: 'table' },
      {
        key: 'l',
        description: 'Latest',
        handler: () => setSelectedIndex(Math.max(0, records.length - 1)),
        context: 'table',
      },
      {
        key: 'enter',
        description: 'Details',
        handler: () => {
          if (selectedRecord) {
            setDetailOffset(0);
            setViewMode('detail');
          }
        },
        context: 'table',
      },

      // Detail pane
      { key: 'up', description: 'Scroll up', handler: () => setDetailOffset((o) => Math.max(0, o - 1)), context: 'detail' },
      { key: 'k', description: 'Scroll up', handler: () => setDetailOffset((o) => Math.max(0, o - 1)), context: 'detail' },
      { key: 'down', description: 'Scroll down', handler: () => setDetailOffset((o) => o + 1), context: 'detail' },
      { key: 'j', description: 'Scroll down', handler: () => setDetailOffset((o) => o + 1), context: 'detail' },
      { key: 'escape', description: 'Back', handler: () => setViewMode('table'), context: 'detail' },
      { key: 'enter', description: 'Back', handler: () => setViewMode('table'), context: 'detail' },

      // Severity filter
      ...SEVERITY_ORDER.map((severity, index) => ({
        key: String(index + 1),
        description: `Toggle ${severity}`,
        handler: () => watch.toggleSeverity(severity),
        context: 'table' as const,
      })),
      { key: 'f', description: 'Severity filter', handler: () => setViewMode('severity'), context: 'table' },
      { key: 'a', description: 'All severities', handler: () => watch.setAllSeverities(true), context: 'table' },

      // Actions
      { key: 'w', description: 'Start/stop watching', handler: () => watch.toggleWatching(), context: 'table' },
      {
        key: 'c',
        description: 'Clear display',
        handler: () => {
          watch.clearDisplay();
          setSelectedIndex(0);
          setMessage({ text: 'Display cleared', type: 'info' });
        },
        context: 'table',
      },
      { key: 'e', description: 'Empty log file', handler: () => setViewMode('confirmEmpty'), context: 'table' },
      { key: '?', description: 'Help', handler: () => setViewMode('help'), context: 'table' },
      { key: 'q', description: 'Quit', handler: () => exit(), context: ['table', 'detail'] },
    ],
    [move, tableHeight, records.length, selectedRecord, watch, exit]
  );

  useKeyboardShortcuts({
    viewMode,
    active: viewMode === 'table' || viewMode === 'detail',
    actions,
    onError: reportError,
  });

  const body = (() => {
    switch (viewMode) {
      case 'detail':
        return selectedRecord
          ? React.createElement(RecordDetail, {
              record: selectedRecord,
              scrollOffset: detailOffset,
              height: Math.max(3, tableHeight - 4),
            })
          : null;
      case 'severity':
        return React.createElement(SeverityOverlay, {
          filterState: watch.filterState,
          onToggle: watch.toggleSeverity,
          onSetAll: watch.setAllSeverities,
          onClose: () => setViewMode('table'),
        });
      case 'confirmEmpty':
        return React.createElement(ConfirmOverlay, {
          title: 'Empty Log File',
          lines: [
            'Are you sure you want to empty the log file?',
            '',
            'This will permanently delete all contents of:',
            props.filePath,
          ],
          onConfirm: () => {
            setViewMode('table');
            setSelectedIndex(0);
            watch.emptyFile().catch(reportError);
          },
          onCancel: () => setViewMode('table'),
        });
      case 'help':
        return React.createElement(HelpOverlay, { onClose: () => setViewMode('table') });
      case 'table':
      default:
        return React.createElement(LogTable, {
          records,
          selectedIndex,
          height: tableHeight,
          width: termWidth,
          hiddenCount: watch.total - records.length,
        });
    }
  })();

  return React.createElement(
    Box,
    { flexDirection: 'column' },
    React.createElement(Header, { filePath: props.filePath, running: watch.running }),
    React.createElement(SeverityBar, { filterState: watch.filterState }),
    React.createElement(Box, { marginTop: 1, flexDirection: 'column' }, body),
    React.createElement(StatusBar, {
      shown: records.length,
      buffered: watch.total,
      stats: watch.stats,
      message,
    }),
    React.createElement(HelpBar, { viewMode, running: watch.running })
  );
};

export default LogViewer;
