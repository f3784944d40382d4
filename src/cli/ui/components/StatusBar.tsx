/**
 * StatusBar Component
 *
 * Footer with record counts, read position and status messages.
 */

import React, { FC } from 'react';
import { Box, Text } from 'ink';
import type { WatchStats } from '../../../tail/index.js';
import { formatStatusLine } from '../format.js';
import type { ViewerMessage } from '../state.js';

export interface StatusBarProps {
  shown: number;
  buffered: number;
  stats: WatchStats;
  message?: ViewerMessage | null;
}

/**
 * Status bar component
 */
export const StatusBar: FC<StatusBarProps> = ({ shown, buffered, stats, message }) => {
  const messageColor = message
    ? message.type === 'error'
      ? 'red'
      : message.type === 'success'
        ? 'green'
        : message.type === 'warning'
          ? 'yellow'
          : 'blue'
    : 'white';

  return React.createElement(
    Box,
    { flexDirection: 'column', marginTop: 1 },
    React.createElement(Text, { color: 'gray' }, formatStatusLine(shown, buffered, stats)),
    message && React.createElement(Text, { color: messageColor }, message.text)
  );
};

export default StatusBar;
