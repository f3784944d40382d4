/**
 * Header Component
 *
 * Viewer header with title, watched file and watch state.
 */

import React, { FC } from 'react';
import { Box, Text } from 'ink';

export interface HeaderProps {
  title?: string;
  filePath: string;
  running: boolean;
}

/**
 * Header component
 */
export const Header: FC<HeaderProps> = ({ title = 'laratail', filePath, running }) => {
  return React.createElement(
    Box,
    { flexDirection: 'row', justifyContent: 'space-between', marginBottom: 1 },
    React.createElement(
      Box,
      null,
      React.createElement(Text, { color: 'cyan', bold: true }, `  ${title}`),
      React.createElement(Text, { color: 'gray' }, ` (${filePath})`)
    ),
    React.createElement(
      Text,
      { color: running ? 'green' : 'red' },
      running ? '[● Watching]' : '[○ Stopped]'
    )
  );
};

export default Header;
