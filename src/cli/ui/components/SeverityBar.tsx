/**
 * SeverityBar Component
 *
 * One-line row of severity checkboxes. Digits 1-8 toggle them in order.
 */

import React, { FC } from 'react';
import { Box, Text } from 'ink';
import { FilterState, SEVERITY_ORDER } from '../../../tail/index.js';
import { formatSeverityCheckbox, SEVERITY_COLORS } from '../format.js';

export interface SeverityBarProps {
  filterState: FilterState;
}

/**
 * Severity bar component
 */
export const SeverityBar: FC<SeverityBarProps> = ({ filterState }) => {
  return React.createElement(
    Box,
    { flexDirection: 'row' },
    ...SEVERITY_ORDER.map((severity, index) =>
      React.createElement(
        Text,
        {
          key: severity,
          color: filterState.has(severity) ? SEVERITY_COLORS[severity] : 'gray',
          dimColor: !filterState.has(severity),
        },
        `${index + 1}${formatSeverityCheckbox(severity, filterState)}  `
      )
    )
  );
};

export default SeverityBar;
