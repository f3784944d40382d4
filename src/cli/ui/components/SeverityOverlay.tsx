/**
 * SeverityOverlay Component
 *
 * Checkbox overlay for the severity filter. Each toggle applies at once;
 * records already shown are hidden or revealed on the next draw.
 */

import React, { FC, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { FilterState, SEVERITY_ORDER, Severity } from '../../../tail/index.js';
import { formatSeverityCheckbox, SEVERITY_COLORS } from '../format.js';

export interface SeverityOverlayProps {
  filterState: FilterState;
  onToggle: (severity: Severity) => void;
  onSetAll: (enabled: boolean) => void;
  onClose: () => void;
}

/**
 * SeverityOverlay component
 */
export const SeverityOverlay: FC<SeverityOverlayProps> = ({ filterState, onToggle, onSetAll, onClose }) => {
  const [focusIndex, setFocusIndex] = useState(0);

  const noneSelected = SEVERITY_ORDER.every((severity) => !filterState.has(severity));

  useInput((input, key) => {
    // Navigation
    if (key.upArrow || input === 'k') {
      setFocusIndex((i) => Math.max(0, i - 1));
    } else if (key.downArrow || input === 'j') {
      setFocusIndex((i) => Math.min(SEVERITY_ORDER.length - 1, i + 1));
    }
    // Toggle checkbox
    else if (input === ' ') {
      const severity = SEVERITY_ORDER[focusIndex];
      if (severity) {
        onToggle(severity);
      }
    }
    // All / none
    else if (input === 'a' || input === 'A') {
      onSetAll(true);
    } else if (input === 'n' || input === 'N') {
      onSetAll(false);
    }
    // Close
    else if (key.return || key.escape || input === 'f') {
      onClose();
    }
  });

  const termWidth = process.stdout.columns || 80;
  const boxWidth = Math.min(50, termWidth - 4);

  return React.createElement(
    Box,
    {
      flexDirection: 'column',
      borderStyle: 'round',
      borderColor: 'cyan',
      paddingX: 2,
      paddingY: 1,
      width: boxWidth,
    },
    // Title
    React.createElement(
      Box,
      { justifyContent: 'center', marginBottom: 1 },
      React.createElement(Text, { bold: true, color: 'cyan' }, 'Severity Filter')
    ),
    // Checkbox items
    ...SEVERITY_ORDER.map((severity, index) => {
      const isFocused = index === focusIndex;
      const isChecked = filterState.has(severity);
      const cursor = isFocused ? '▶ ' : '  ';

      return React.createElement(
        Box,
        { key: severity, flexDirection: 'row' },
        React.createElement(
          Text,
          {
            color: isFocused ? 'cyan' : isChecked ? SEVERITY_COLORS[severity] : 'gray',
            bold: isFocused,
          },
          `${cursor}${formatSeverityCheckbox(severity, filterState)}`
        )
      );
    }),
    // Warning if none selected
    noneSelected &&
      React.createElement(
        Box,
        { marginTop: 1 },
        React.createElement(Text, { color: 'yellow' }, 'Only entries of unknown severity will show')
      ),
    // Footer
    React.createElement(
      Box,
      { marginTop: 1 },
      React.createElement(
        Text,
        { color: 'gray', italic: true },
        '[Space] Toggle  [A] All  [N] None  [Enter/Esc] Close'
      )
    )
  );
};

export default SeverityOverlay;
