/**
 * ConfirmOverlay Component
 *
 * Yes/no confirmation box. "No" is the default answer.
 */

import React, { FC } from 'react';
import { Box, Text, useInput } from 'ink';

export interface ConfirmOverlayProps {
  title: string;
  /** Body lines */
  lines: string[];
  onConfirm: () => void;
  onCancel: () => void;
}

/**
 * ConfirmOverlay component
 */
export const ConfirmOverlay: FC<ConfirmOverlayProps> = ({ title, lines, onConfirm, onCancel }) => {
  useInput((input, key) => {
    if (input === 'y' || input === 'Y') {
      onConfirm();
    } else if (input === 'n' || input === 'N' || key.escape || key.return) {
      onCancel();
    }
  });

  const termWidth = process.stdout.columns || 80;
  const boxWidth = Math.min(70, termWidth - 4);

  return React.createElement(
    Box,
    {
      flexDirection: 'column',
      borderStyle: 'round',
      borderColor: 'yellow',
      paddingX: 2,
      paddingY: 1,
      width: boxWidth,
    },
    React.createElement(
      Box,
      { justifyContent: 'center', marginBottom: 1 },
      React.createElement(Text, { bold: true, color: 'yellow' }, title)
    ),
    ...lines.map((line, index) => React.createElement(Text, { key: index }, line.length > 0 ? line : ' ')),
    React.createElement(
      Box,
      { marginTop: 1 },
      React.createElement(Text, { color: 'gray', italic: true }, '[Y] Yes  [N/Enter/Esc] No')
    )
  );
};

export default ConfirmOverlay;
