/**
 * Configuration Manager
 *
 * Persistent CLI state, currently the recent-files list.
 * Uses the 'conf' package for cross-platform config file handling.
 */

import Conf from 'conf';
import { CliConfig } from '../types/index.js';
import { addRecentFile, normalizeRecentFiles, removeRecentFile } from './RecentFiles.js';

const defaults: CliConfig = {
  recentFiles: [],
};

let store: Conf<CliConfig> | null = null;

/**
 * Configuration store, created on first use.
 *
 * The config file is stored at:
 * - macOS: ~/Library/Preferences/laratail-nodejs/config.json
 * - Windows: %APPDATA%/laratail-nodejs/Config/config.json
 * - Linux: ~/.config/laratail-nodejs/config.json
 */
function config(): Conf<CliConfig> {
  if (!store) {
    store = new Conf<CliConfig>({
      projectName: 'laratail',
      defaults,
    });
  }
  return store;
}

/**
 * ConfigManager provides typed access to CLI configuration
 */
export const ConfigManager = {
  /**
   * Get the path to the config file
   */
  getPath(): string {
    return config().path;
  },

  /**
   * Reset all configuration to defaults
   */
  reset(): void {
    config().clear();
  },

  // ==========================================================================
  // Recent files
  // ==========================================================================

  getRecentFiles(): string[] {
    return normalizeRecentFiles(config().get('recentFiles'));
  },

  /**
   * Record a file as just opened
   */
  addRecentFile(filePath: string): string[] {
    const next = addRecentFile(this.getRecentFiles(), filePath);
    config().set('recentFiles', next);
    return next;
  },

  removeRecentFile(filePath: string): string[] {
    const next = removeRecentFile(this.getRecentFiles(), filePath);
    config().set('recentFiles', next);
    return next;
  },

  clearRecentFiles(): void {
    config().set('recentFiles', []);
  },
};

export default ConfigManager;
