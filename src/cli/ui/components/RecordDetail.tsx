/**
 * RecordDetail Component
 *
 * Detail pane for the selected record: header fields, then the structured
 * payload pretty-printed or the continuation lines as written.
 */

import React, { FC } from 'react';
import { Box, Text } from 'ink';
import type { LogRecord } from '../../../tail/index.js';
import { formatRecordTime } from '../../lib/OutputFormatter.js';
import { getDetailLines, SEVERITY_COLORS } from '../format.js';

export interface RecordDetailProps {
  record: LogRecord;
  /** First detail line shown */
  scrollOffset: number;
  height: number;
}

/**
 * Record detail component
 */
export const RecordDetail: FC<RecordDetailProps> = ({ record, scrollOffset, height }) => {
  const lines = getDetailLines(record);
  const maxOffset = Math.max(0, lines.length - height);
  const offset = Math.min(Math.max(0, scrollOffset), maxOffset);
  const shown = lines.slice(offset, offset + height);

  return React.createElement(
    Box,
    { flexDirection: 'column', borderStyle: 'round', borderColor: 'cyan', paddingX: 1 },
    React.createElement(
      Box,
      { flexDirection: 'row' },
      React.createElement(Text, { color: 'gray' }, `${formatRecordTime(record)} `),
      React.createElement(Text, { color: SEVERITY_COLORS[record.severity], bold: true }, record.severity.toUpperCase()),
      record.channel ? React.createElement(Text, { color: 'gray' }, ` ${record.channel}`) : null,
      React.createElement(Text, { color: 'gray' }, `  [${record.payloadKind}]`)
    ),
    React.createElement(Text, { bold: true }, record.summary),
    record.exception ? React.createElement(Text, { color: 'red' }, record.exception) : null,
    React.createElement(Box, { marginTop: 1, flexDirection: 'column' }, ...shown.map((line, i) =>
      React.createElement(Text, { key: offset + i, wrap: 'truncate' }, line.length > 0 ? line : ' ')
    )),
    lines.length > height
      ? React.createElement(
          Text,
          { color: 'gray', italic: true },
          `Lines ${offset + 1}-${offset + shown.length} of ${lines.length}`
        )
      : null
  );
};

export default RecordDetail;
