/**
 * useKeyboardShortcuts Hook
 *
 * Centralized keyboard shortcut handling for the log viewer.
 */

import { useCallback } from 'react';
import { useInput, Key } from 'ink';
import { ViewMode } from '../state.js';
import { contextMatches, KeyboardAction, keyMatches } from '../keys.js';

export type { KeyboardAction } from '../keys.js';

export interface UseKeyboardShortcutsOptions {
  /** Current view mode */
  viewMode: ViewMode;
  /** Overlays that read keys themselves turn this off */
  active?: boolean;
  /** List of keyboard actions to register */
  actions: KeyboardAction[];
  /** Called when a handler fails */
  onError?: (error: unknown) => void;
}

/**
 * Hook for managing keyboard shortcuts
 */
export function useKeyboardShortcuts(options: UseKeyboardShortcutsOptions): void {
  const { viewMode, active = true, actions, onError } = options;

  const handleInput = useCallback(
    (input: string, key: Key) => {
      for (const action of actions) {
        if (keyMatches(input, key, action) && contextMatches(viewMode, action)) {
          Promise.resolve(action.handler()).catch((error: unknown) => onError?.(error));
          return;
        }
      }
    },
    [viewMode, actions, onError]
  );

  useInput(handleInput, { isActive: active });
}
