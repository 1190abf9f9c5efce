import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should use defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.logLevel).toBe('warn');
    expect(config.buffer).toEqual({ backward: 2, forward: 5 });
    expect(config.imageCache).toEqual({ capacity: 10 });
    expect(config.bandwidth).toEqual({ windowMs: 10_000 });
    expect(config.playback).toEqual({
      settleDelayMs: 100,
      itemsDebounceMs: 100,
      errorDurationSeconds: 5,
      timerTickMs: 100,
    });
  });

  it('should read numeric overrides', () => {
    const config = loadConfig({
      PLAYLIST_BACKWARD_BUFFER: '1',
      PLAYLIST_FORWARD_BUFFER: '3',
      PLAYLIST_ERROR_DURATION_SECONDS: '2.5',
    });

    expect(config.buffer).toEqual({ backward: 1, forward: 3 });
    expect(config.playback.errorDurationSeconds).toBe(2.5);
  });

  it('should fall back to defaults for invalid values', () => {
    const config = loadConfig({
      PLAYLIST_FORWARD_BUFFER: 'many',
      PLAYLIST_IMAGE_CACHE_CAPACITY: '0',
      PLAYLIST_SETTLE_DELAY_MS: '   ',
      LOG_LEVEL: 'verbose',
    });

    expect(config.buffer.forward).toBe(5);
    expect(config.imageCache.capacity).toBe(10);
    expect(config.playback.settleDelayMs).toBe(100);
    expect(config.logLevel).toBe('warn');
  });

  it('should derive the log level from NODE_ENV', () => {
    expect(loadConfig({ NODE_ENV: 'development' }).logLevel).toBe('debug');
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent');
    expect(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'error' }).logLevel).toBe('error');
  });
});
