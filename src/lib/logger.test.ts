import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, LogLevel, logger } from './logger';

describe('logger', () => {
  let initialLevel: LogLevel;

  beforeEach(() => {
    initialLevel = logger.getLevel();
  });

  afterEach(() => {
    logger.setLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('should prefix messages with the module name', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logger.setLevel(LogLevel.WARN);

    createLogger('ImageCache').warn('Failed to load', 'a.jpg');

    expect(warn).toHaveBeenCalledWith('[ImageCache] Failed to load', 'a.jpg');
  });

  it('should nest child prefixes', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.setLevel(LogLevel.ERROR);

    createLogger('Player').child('slot-1').error('boom');

    expect(error).toHaveBeenCalledWith('[Player:slot-1] boom');
  });

  it('should drop messages below the level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    logger.setLevel(LogLevel.WARN);

    const moduleLogger = createLogger('BufferWindowManager');
    moduleLogger.debug('resize');
    moduleLogger.info('ready');

    expect(log).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });

  it('should share the level across loggers', () => {
    const moduleLogger = createLogger('RendererSlot');

    logger.setLevel(LogLevel.SILENT);

    expect(moduleLogger.getLevel()).toBe(LogLevel.SILENT);
  });
});
