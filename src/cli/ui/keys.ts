/**
 * Key bindings
 *
 * Matching of Ink key events against viewer actions. Only Ink's types are
 * imported here.
 */

import type { Key } from 'ink';
import type { ViewMode } from './state.js';

export interface KeyboardAction {
  key: string;
  description: string;
  handler: () => void | Promise<void>;
  context?: ViewMode | ViewMode[];
}

/**
 * Check if a key matches an action
 */
export function keyMatches(input: string, key: Key, action: KeyboardAction): boolean {
  // Handle special keys
  if (action.key === 'up' && key.upArrow) return true;
  if (action.key === 'down' && key.downArrow) return true;
  if (action.key === 'enter' && key.return) return true;
  if (action.key === 'escape' && key.escape) return true;
  if (action.key === 'space' && input === ' ') return true;
  if (action.key === 'pageup' && key.pageUp) return true;
  if (action.key === 'pagedown' && key.pageDown) return true;

  // Handle character keys (case-insensitive by default)
  if (action.key.length === 1) {
    return input.toLowerCase() === action.key.toLowerCase();
  }

  return false;
}

/**
 * Check if action context matches current view mode
 */
export function contextMatches(viewMode: ViewMode, action: KeyboardAction): boolean {
  if (!action.context) return true;

  if (Array.isArray(action.context)) {
    return action.context.includes(viewMode);
  }

  return action.context === viewMode;
}

/**
 * Viewer shortcuts (for help display)
 */
export const STANDARD_SHORTCUTS = {
  navigation: [
    { key: '↑/k', description: 'Previous record' },
    { key: '↓/j', description: 'Next record' },
    { key: 'PgUp/PgDn', description: 'Page up/down' },
    { key: 'g/l', description: 'First/latest record' },
    { key: 'Enter', description: 'Show details' },
  ],
  filter: [
    { key: '1-8', description: 'Toggle emergency … debug' },
    { key: 'f', description: 'Severity checkboxes' },
    { key: 'a', description: 'Show all severities' },
  ],
  actions: [
    { key: 'w', description: 'Start/stop watching' },
    { key: 'c', description: 'Clear display' },
    { key: 'e', description: 'Empty log file' },
    { key: '?', description: 'Help' },
    { key: 'q', description: 'Quit' },
  ],
};
