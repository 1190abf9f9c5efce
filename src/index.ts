export * from './features/playlist';
export * from './features/player';
export * from './features/media';
export type {
  CustomPlaylistItem,
  ErrorPlaylistItem,
  ImagePlaylistItem,
  PlaybackBehavior,
  PlaylistItem,
  PlaylistItemStatus,
  PlaylistItemType,
  PresentationType,
  SlotStatus,
  VideoPlaylistItem,
} from './types/playlist';
export { PlaylistLoadError } from './lib/errors';
export { createLogger, Logger, LogLevel, logger } from './lib/logger';
export { config, loadConfig } from './lib/config';
export type { AppConfig, LogLevelName, PlaybackTimings } from './lib/config';
