/**
 * LogTable Component
 *
 * Scrolling table of records: time, level, message. The selected row is
 * kept on screen.
 */

import React, { FC } from 'react';
import { Box, Text } from 'ink';
import type { LogRecord } from '../../../tail/index.js';
import { formatRowCells, SEVERITY_COLORS } from '../format.js';
import { getRowWindow } from '../state.js';

export interface LogTableProps {
  records: LogRecord[];
  selectedIndex: number;
  /** Rows available for records */
  height: number;
  width: number;
  /** Buffered records hidden by the filter */
  hiddenCount: number;
}

/**
 * Log table component
 */
export const LogTable: FC<LogTableProps> = ({ records, selectedIndex, height, width, hiddenCount }) => {
  const { start, end } = getRowWindow(records.length, selectedIndex, height);
  const visible = records.slice(start, end);

  const rows = visible.map((record, offset) => {
    const index = start + offset;
    const selected = index === selectedIndex;
    const cells = formatRowCells(record, width);

    return React.createElement(
      Box,
      { key: index, flexDirection: 'row' },
      React.createElement(Text, { color: selected ? 'cyan' : 'white', inverse: selected }, selected ? '▶ ' : '  '),
      React.createElement(Text, { color: 'gray' }, `${cells.time} `),
      React.createElement(Text, { color: SEVERITY_COLORS[record.severity], bold: selected }, `${cells.level} `),
      React.createElement(Text, { color: selected ? 'cyan' : 'white', wrap: 'truncate' }, cells.message)
    );
  });

  return React.createElement(
    Box,
    { flexDirection: 'column' },
    React.createElement(
      Text,
      { color: 'gray', bold: true },
      '  ' + 'TIME'.padEnd(20) + 'LEVEL'.padEnd(10) + 'MESSAGE'
    ),
    React.createElement(Text, { color: 'gray' }, '─'.repeat(Math.max(10, Math.min(width - 2, 120)))),
    records.length === 0
      ? React.createElement(
          Text,
          { color: 'gray', italic: true },
          hiddenCount > 0 ? `  ${hiddenCount} record(s) hidden by the severity filter` : '  Waiting for log entries...'
        )
      : null,
    ...rows
  );
};

export default LogTable;
