import { describe, it, expect, vi, afterEach } from 'vitest';
import { LogLevel, Logger, logger, toLogLevel } from './logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    Logger.configure({ level: LogLevel.INFO });
  });

  it('should map configured level names', () => {
    expect(toLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(toLogLevel('warn')).toBe(LogLevel.WARN);
    expect(toLogLevel('silent')).toBe(LogLevel.SILENT);
  });

  it('should drop messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const log = new Logger({ level: toLogLevel('info') });
    log.debug('hidden');
    log.info('Loaded plan');
    log.warn('Slow disk');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith('[planner] [INFO] Loaded plan');
    expect(warn).toHaveBeenCalledWith('[planner] [WARN] Slow disk');
  });

  it('should append context as JSON', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new Logger().error('Cannot save', { name: 'launch', tasks: 2 });
    new Logger().error('No context', {});

    expect(error.mock.calls).toEqual([
      ['[planner] [ERROR] Cannot save {"name":"launch","tasks":2}'],
      ['[planner] [ERROR] No context']
    ]);
  });

  it('should write nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new Logger({ level: LogLevel.SILENT }).error('boom');
    expect(error).not.toHaveBeenCalled();
  });

  it('should reconfigure the shared instance in place', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    logger.debug('before');
    Logger.configure({ level: LogLevel.DEBUG });
    logger.debug('after', { verbose: true });

    expect(logger).toBe(Logger.getInstance());
    expect(logger.getLevel()).toBe(LogLevel.DEBUG);
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[planner] [DEBUG] after {"verbose":true}');
  });
});
