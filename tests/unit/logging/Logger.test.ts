import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import winston from 'winston';
import { Logger, setGlobalLevelProvider } from '../../../src/logging/Logger.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import { resetDebugRegistry, setComponentLevel } from '../../../src/logging/DebugModeRegistry.js';
import { formatLocalTimestamp, formatTextLine } from '../../../src/logging/transports.js';

function createTestWinston() {
  const root = winston.createLogger({
    levels: { error: 0, warn: 1, info: 2, debug: 3, trace: 4 },
    level: 'trace',
    transports: [new winston.transports.Console({ silent: true })],
  });
  const log = jest.spyOn(root, 'log').mockImplementation(() => root);
  return { root, log };
}

describe('Logger', () => {
  let globalLevel: LogLevel;

  beforeEach(() => {
    resetDebugRegistry();
    globalLevel = LogLevel.INFO;
    setGlobalLevelProvider(() => globalLevel);
  });

  it('should tag messages with the component', () => {
    const { root, log } = createTestWinston();
    const logger = new Logger('log-watcher', () => root);

    logger.info('Watching', { filePath: '/tmp/laravel.log' });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('info', 'Watching', { component: 'log-watcher', filePath: '/tmp/laravel.log' });
  });

  it('should attach the error stack', () => {
    const { root, log } = createTestWinston();
    const logger = new Logger('log-watcher', () => root);
    const error = new Error('boom');

    logger.error('Poll failed', error);

    expect(log).toHaveBeenCalledWith('error', 'Poll failed', { component: 'log-watcher', errorStack: error.stack });
  });

  it('should drop messages below the global level', () => {
    const { root, log } = createTestWinston();
    const logger = new Logger('tail-session', () => root);

    logger.debug('hidden');
    logger.trace('hidden');

    expect(log).not.toHaveBeenCalled();
    expect(logger.isDebugEnabled()).toBe(false);
  });

  it('should honour a component override', () => {
    const { root, log } = createTestWinston();
    const logger = new Logger('tail-session', () => root);
    setComponentLevel('tail-session', LogLevel.TRACE);

    logger.trace('visible');

    expect(log).toHaveBeenCalledWith('trace', 'visible', { component: 'tail-session' });
    expect(logger.isDebugEnabled()).toBe(true);
  });

  it('should follow a change of the global level', () => {
    const { root, log } = createTestWinston();
    const logger = new Logger('tail-session', () => root);

    globalLevel = LogLevel.ERROR;
    logger.warn('hidden');
    expect(log).not.toHaveBeenCalled();
  });

  it('should name child loggers after their parent', () => {
    const { root } = createTestWinston();
    const child = new Logger('log-watcher', () => root).child('session');
    expect(child.getComponent()).toBe('log-watcher.session');
  });
});

describe('formatTextLine', () => {
  const now = new Date(2026, 1, 10, 14, 30, 15, 42);

  it('should render level, timestamp and component', () => {
    expect(formatTextLine({ level: 'info', message: 'Watching', component: 'log-watcher' }, 'local', now)).toBe(
      'INFO  2026-02-10 14:30:15,042 [log-watcher] Watching'
    );
  });

  it('should append a stack on its own lines', () => {
    expect(formatTextLine({ level: 'error', message: 'failed', errorStack: 'Error: x\n    at y' }, 'local', now)).toBe(
      'ERROR 2026-02-10 14:30:15,042 failed\nError: x\n    at y'
    );
  });

  it('should pad local timestamps', () => {
    expect(formatLocalTimestamp(new Date(2026, 0, 2, 3, 4, 5, 6))).toBe('2026-01-02 03:04:05,006');
  });
});
