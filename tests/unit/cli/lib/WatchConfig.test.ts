import { describe, it, expect } from '@jest/globals';
import {
  CLI_IDLE_FLUSH_MS,
  ConfigError,
  loadWatchDefaults,
  resolveWatchSettings,
} from '../../../../src/cli/lib/WatchConfig.js';
import { Severity, SEVERITY_ORDER } from '../../../../src/tail/Severity.js';
import type { WatchSettings } from '../../../../src/cli/types/index.js';

const DEFAULTS: WatchSettings = {
  pollIntervalMs: 500,
  bufferSize: 5000,
  idleFlushMs: CLI_IDLE_FLUSH_MS,
  levels: [...SEVERITY_ORDER],
  fromEnd: false,
};

describe('WatchConfig', () => {
  describe('loadWatchDefaults', () => {
    it('should use built-in defaults for an empty environment', () => {
      expect(loadWatchDefaults({})).toEqual(DEFAULTS);
    });

    it('should treat blank variables as unset', () => {
      expect(loadWatchDefaults({ LARATAIL_POLL_INTERVAL: ' ', LARATAIL_LEVELS: '' })).toEqual(DEFAULTS);
    });

    it('should read the environment', () => {
      const settings = loadWatchDefaults({
        LARATAIL_POLL_INTERVAL: '200',
        LARATAIL_BUFFER_SIZE: '100',
        LARATAIL_LEVELS: 'error,warning',
      });

      expect(settings.pollIntervalMs).toBe(200);
      expect(settings.bufferSize).toBe(100);
      expect(settings.levels).toEqual([Severity.ERROR, Severity.WARNING]);
    });

    it('should name the offending variable', () => {
      expect(() => loadWatchDefaults({ LARATAIL_POLL_INTERVAL: '10' })).toThrow(/^LARATAIL_POLL_INTERVAL: /);
      expect(() => loadWatchDefaults({ LARATAIL_BUFFER_SIZE: 'lots' })).toThrow(ConfigError);
    });
  });

  describe('resolveWatchSettings', () => {
    it('should keep defaults when no flag is given', () => {
      expect(resolveWatchSettings({}, DEFAULTS)).toEqual(DEFAULTS);
    });

    it('should let flags override', () => {
      expect(
        resolveWatchSettings(
          { interval: '250', buffer: '10', idleFlush: '0', levels: 'critical, error', fromEnd: true },
          DEFAULTS
        )
      ).toEqual({
        pollIntervalMs: 250,
        bufferSize: 10,
        idleFlushMs: 0,
        levels: [Severity.CRITICAL, Severity.ERROR],
        fromEnd: true,
      });
    });

    it('should list unknown severities', () => {
      expect(() => resolveWatchSettings({ levels: 'error,loud' }, DEFAULTS)).toThrow(
        '--levels: Unknown severity: loud (expected emergency, alert, critical, error, warning, notice, info, debug)'
      );
    });

    it('should reject out-of-range numbers', () => {
      expect(() => resolveWatchSettings({ interval: '20' }, DEFAULTS)).toThrow(/^--interval: /);
      expect(() => resolveWatchSettings({ buffer: '0' }, DEFAULTS)).toThrow(/^--buffer: /);
      expect(() => resolveWatchSettings({ idleFlush: '-1' }, DEFAULTS)).toThrow(/^--idle-flush: /);
    });
  });
});
