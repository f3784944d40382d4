/**
 * Viewer text helpers
 *
 * Plain strings for the table rows, detail pane, checkboxes, footer
 * and shortcut hints. No Ink imports.
 */

import { FilterState, formatRecordDetails, LogRecord, Severity, WatchStats } from '../../tail/index.js';
import { formatNumber, formatRecordTime, pad, truncate } from '../lib/OutputFormatter.js';
import type { ViewMode } from './state.js';

/** Time, level and cursor columns plus separators */
const FIXED_COLUMNS_WIDTH = 2 + 19 + 1 + 9 + 1;

export const NO_DETAILS_TEXT = 'No additional details available';

/** Ink colors per severity */
export const SEVERITY_COLORS: Record<Severity, string> = {
  [Severity.EMERGENCY]: 'magenta',
  [Severity.ALERT]: 'magenta',
  [Severity.CRITICAL]: 'red',
  [Severity.ERROR]: 'red',
  [Severity.WARNING]: 'yellow',
  [Severity.NOTICE]: 'cyan',
  [Severity.INFO]: 'green',
  [Severity.DEBUG]: 'gray',
  [Severity.UNKNOWN]: 'white',
};

export interface RowCells {
  time: string;
  level: string;
  message: string;
}

/**
 * Table cells for one record, fitted to the terminal width
 */
export function formatRowCells(record: LogRecord, width: number): RowCells {
  const messageWidth = Math.max(10, width - FIXED_COLUMNS_WIDTH);
  return {
    time: pad(formatRecordTime(record), 19),
    level: pad(record.severity.toUpperCase(), 9),
    message: truncate(record.summary, messageWidth),
  };
}

/**
 * Lines shown in the detail pane for the selected record
 */
export function getDetailLines(record: LogRecord): string[] {
  if (record.payloadKind === 'none') {
    return [NO_DETAILS_TEXT];
  }
  return formatRecordDetails(record).split('\n');
}

/**
 * Checkbox label, e.g. "[x] error"
 */
export function formatSeverityCheckbox(severity: Severity, filterState: FilterState): string {
  return `${filterState.has(severity) ? '[x]' : '[ ]'} ${severity}`;
}

/**
 * Footer counts, e.g. "Showing 10 of 12 | Filtered at read: 3"
 */
export function formatStatusLine(shown: number, buffered: number, stats: WatchStats): string {
  const parts = [`Showing ${formatNumber(shown)} of ${formatNumber(buffered)}`];
  if (stats.filtered > 0) {
    parts.push(`Filtered at read: ${formatNumber(stats.filtered)}`);
  }
  if (stats.errors > 0) {
    parts.push(`I/O errors: ${formatNumber(stats.errors)}`);
  }
  return parts.join(' | ');
}

export interface ShortcutHint {
  key: string;
  label: string;
}

const DETAIL_SHORTCUTS: ShortcutHint[] = [
  { key: '↑↓', label: 'Scroll' },
  { key: 'Esc', label: 'Back' },
];

const SEVERITY_SHORTCUTS: ShortcutHint[] = [
  { key: 'Space', label: 'Toggle' },
  { key: 'Esc', label: 'Close' },
];

const CONFIRM_SHORTCUTS: ShortcutHint[] = [
  { key: 'Y', label: 'Yes' },
  { key: 'N', label: 'No' },
];

const HELP_SHORTCUTS: ShortcutHint[] = [{ key: 'Any', label: 'Close' }];

function tableShortcuts(running: boolean): ShortcutHint[] {
  return [
    { key: '↑↓', label: 'Navigate' },
    { key: 'Enter', label: 'Details' },
    { key: '1-8', label: 'Levels' },
    { key: 'F', label: 'Filter' },
    { key: 'W', label: running ? 'Stop' : 'Start' },
    { key: 'C', label: 'Clear' },
    { key: 'E', label: 'Empty' },
    { key: '?', label: 'Help' },
    { key: 'Q', label: 'Quit' },
  ];
}

/**
 * Hint text for a view
 */
export function getShortcuts(viewMode: ViewMode, running: boolean): ShortcutHint[] {
  switch (viewMode) {
    case 'detail':
      return DETAIL_SHORTCUTS;
    case 'severity':
      return SEVERITY_SHORTCUTS;
    case 'confirmEmpty':
      return CONFIRM_SHORTCUTS;
    case 'help':
      return HELP_SHORTCUTS;
    case 'table':
    default:
      return tableShortcuts(running);
  }
}
