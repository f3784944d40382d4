/**
 * HelpBar Component
 *
 * Contextual keyboard shortcut hints at the bottom of the viewer.
 */

import React, { FC } from 'react';
import { Box, Text } from 'ink';
import { ViewMode } from '../state.js';
import { getShortcuts } from '../format.js';

export interface HelpBarProps {
  viewMode: ViewMode;
  running: boolean;
}

/**
 * Help bar component
 */
export const HelpBar: FC<HelpBarProps> = ({ viewMode, running }) => {
  const shortcutText = getShortcuts(viewMode, running)
    .map((s) => `[${s.key}] ${s.label}`)
    .join('  ');

  return React.createElement(
    Box,
    { marginTop: 1, flexDirection: 'row' },
    React.createElement(Text, { color: 'gray' }, shortcutText)
  );
};

export default HelpBar;
