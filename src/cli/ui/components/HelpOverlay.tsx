/**
 * HelpOverlay Component
 *
 * Key reference for the viewer, including which number toggles which severity.
 */

import React, { FC } from 'react';
import { Box, Text, useInput } from 'ink';
import { SEVERITY_ORDER } from '../../../tail/index.js';
import { STANDARD_SHORTCUTS } from '../keys.js';
import { SEVERITY_COLORS } from '../format.js';

export interface HelpOverlayProps {
  onClose: () => void;
}

interface Shortcut {
  key: string;
  description: string;
}

const KEY_WIDTH = 12;

function section(title: string, shortcuts: Shortcut[]): React.ReactElement {
  return React.createElement(
    Box,
    { key: title, flexDirection: 'column', marginBottom: 1 },
    React.createElement(Text, { bold: true, underline: true }, title),
    ...shortcuts.map((shortcut) =>
      React.createElement(
        Box,
        { key: shortcut.key },
        React.createElement(Text, { color: 'yellow' }, shortcut.key.padEnd(KEY_WIDTH)),
        React.createElement(Text, { color: 'gray' }, shortcut.description)
      )
    )
  );
}

function severityKeys(): React.ReactElement {
  return React.createElement(
    Box,
    { key: 'severity-keys', marginBottom: 1 },
    ...SEVERITY_ORDER.map((severity, index) =>
      React.createElement(
        Text,
        { key: severity, color: SEVERITY_COLORS[severity] },
        `${index + 1}:${severity}  `
      )
    )
  );
}

export const HelpOverlay: FC<HelpOverlayProps> = ({ onClose }) => {
  useInput(() => onClose());

  const width = Math.min(60, (process.stdout.columns || 80) - 4);

  return React.createElement(
    Box,
    { flexDirection: 'column', borderStyle: 'round', borderColor: 'cyan', paddingX: 2, paddingY: 1, width },
    React.createElement(Text, { bold: true, color: 'cyan' }, 'laratail keys'),
    React.createElement(Box, { height: 1 }),
    section('Navigation', STANDARD_SHORTCUTS.navigation),
    section('Severity filter', STANDARD_SHORTCUTS.filter),
    severityKeys(),
    section('Actions', STANDARD_SHORTCUTS.actions),
    React.createElement(Text, { color: 'gray', italic: true }, 'Any key closes this help')
  );
};

export default HelpOverlay;
