/**
 * Runtime configuration from environment variables
 *
 * Every value has a default, so an empty environment yields a working setup.
 * Values that fail validation fall back to their defaults instead of throwing.
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   const capacity = config.imageCache.capacity;
 */

import { z } from 'zod';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevelName = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  NODE_ENV: z.string().default('production'),
  LOG_LEVEL: logLevelSchema.optional().catch(undefined),
  PLAYLIST_BACKWARD_BUFFER: z.coerce.number().int().min(0).catch(2),
  PLAYLIST_FORWARD_BUFFER: z.coerce.number().int().min(0).catch(5),
  PLAYLIST_IMAGE_CACHE_CAPACITY: z.coerce.number().int().min(1).catch(10),
  PLAYLIST_ERROR_DURATION_SECONDS: z.coerce.number().positive().catch(5),
  PLAYLIST_SETTLE_DELAY_MS: z.coerce.number().int().min(0).catch(100),
  PLAYLIST_ITEMS_DEBOUNCE_MS: z.coerce.number().int().min(0).catch(100),
  PLAYLIST_BANDWIDTH_WINDOW_MS: z.coerce.number().int().positive().catch(10_000),
});

type Env = z.infer<typeof envSchema>;

export interface PlaybackTimings {
  /** Delay before resuming playback after an index change */
  settleDelayMs: number;
  /** Quiet period before a replaced item list triggers renderer work */
  itemsDebounceMs: number;
  /** Duration used by items that failed to load */
  errorDurationSeconds: number;
  /** Progress timer tick for non-media items */
  timerTickMs: number;
}

export interface AppConfig {
  logLevel: LogLevelName;
  buffer: {
    backward: number;
    forward: number;
  };
  imageCache: {
    capacity: number;
  };
  bandwidth: {
    windowMs: number;
  };
  playback: PlaybackTimings;
}

function defaultLogLevel(env: Env): LogLevelName {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'development' ? 'debug' : 'warn';
}

/**
 * Build configuration from an environment map.
 * Exposed separately from `config` so tests can feed their own values.
 */
export function loadConfig(source: Record<string, string | undefined>): AppConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const env = envSchema.parse(present);

  return {
    logLevel: defaultLogLevel(env),
    buffer: {
      backward: env.PLAYLIST_BACKWARD_BUFFER,
      forward: env.PLAYLIST_FORWARD_BUFFER,
    },
    imageCache: {
      capacity: env.PLAYLIST_IMAGE_CACHE_CAPACITY,
    },
    bandwidth: {
      windowMs: env.PLAYLIST_BANDWIDTH_WINDOW_MS,
    },
    playback: {
      settleDelayMs: env.PLAYLIST_SETTLE_DELAY_MS,
      itemsDebounceMs: env.PLAYLIST_ITEMS_DEBOUNCE_MS,
      errorDurationSeconds: env.PLAYLIST_ERROR_DURATION_SECONDS,
      timerTickMs: 100,
    },
  };
}

export const config: AppConfig = loadConfig(process.env);
