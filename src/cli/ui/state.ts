/**
 * Viewer state helpers
 *
 * View modes, status messages and the pure list arithmetic behind the
 * record table. Kept free of Ink so it can be tested directly.
 */

export type ViewMode = 'table' | 'detail' | 'severity' | 'confirmEmpty' | 'help';

export interface ViewerMessage {
  text: string;
  type: 'success' | 'error' | 'info' | 'warning';
}

export interface RowWindow {
  start: number;
  end: number;
}

/**
 * Keep an index inside [0, length - 1]; 0 for an empty list.
 */
export function clampIndex(index: number, length: number): number {
  if (length <= 0) return 0;
  return Math.min(Math.max(0, index), length - 1);
}

/**
 * Slice of rows to draw so the selected row stays on screen, as the
 * bottom row of the window once the list is longer than the screen.
 */
export function getRowWindow(total: number, selected: number, height: number): RowWindow {
  const rows = Math.max(1, height);
  if (total <= rows) {
    return { start: 0, end: total };
  }
  const index = clampIndex(selected, total);
  const start = Math.max(0, index - rows + 1);
  return { start, end: start + rows };
}

/**
 * Selection after the list changed length. A selection on the last row
 * follows new rows, like a terminal scrolling with output.
 */
export function followSelection(selected: number, previousLength: number, nextLength: number): number {
  if (nextLength === 0) return 0;
  const wasAtEnd = previousLength === 0 || selected >= previousLength - 1;
  if (wasAtEnd) return nextLength - 1;
  return clampIndex(selected, nextLength);
}
