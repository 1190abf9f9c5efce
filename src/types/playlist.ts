// What happens when an item's natural duration elapses
export type PlaybackBehavior =
  | { type: 'playOnce' }
  | { type: 'loop' }
  | { type: 'repeat'; count: number }; // count = additional plays before advancing

// Base type for all playlist items
type BasePlaylistItem = {
  id: string; // Disambiguates duplicate urls/content
  behavior: PlaybackBehavior;
};

// Discriminated union types for different item types
export type ImagePlaylistItem = BasePlaylistItem & {
  type: 'image';
  url: string;
  duration: number; // Seconds on screen
};

export type VideoPlaylistItem = BasePlaylistItem & {
  type: 'video';
  url: string;
};

// Non-media placeholder that advances on a timer
export type CustomPlaylistItem = BasePlaylistItem & {
  type: 'custom';
  duration: number;
};

// Sentinel for load or playback failure
export type ErrorPlaylistItem = BasePlaylistItem & {
  type: 'error';
};

// Union type for all playlist items
export type PlaylistItem =
  | ImagePlaylistItem
  | VideoPlaylistItem
  | CustomPlaylistItem
  | ErrorPlaylistItem;

export type PlaylistItemType = PlaylistItem['type'];

/** Load and readiness state of an item */
export type PlaylistItemStatus = 'loading' | 'ready' | 'error';

/** Renderer slot state; `idle` means bound to nothing */
export type SlotStatus = 'idle' | PlaylistItemStatus;

/**
 * How a presentation layer moves through the playlist.
 * `tapThrough` stacks the slots and advances when an item ends;
 * `verticalFeed` pages through items by scrolling and replays the current item.
 */
export type PresentationType = 'tapThrough' | 'verticalFeed';
