/**
 * Playlist item factories, identity and validation.
 *
 * Items are compared by value (type, id, variant fields and behavior), never by
 * reference, so a slot keeps its preparation when the same item arrives in a
 * freshly built array.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type {
  CustomPlaylistItem,
  ErrorPlaylistItem,
  ImagePlaylistItem,
  PlaybackBehavior,
  PlaylistItem,
  VideoPlaylistItem,
} from '@/types/playlist';

export const DEFAULT_IMAGE_DURATION_SECONDS = 10;

const PLAY_ONCE: PlaybackBehavior = { type: 'playOnce' };

interface ItemOptions {
  id?: string;
  behavior?: PlaybackBehavior;
}

function generateItemId(): string {
  return randomUUID();
}

export function imageItem(
  url: string,
  options: ItemOptions & { duration?: number } = {}
): ImagePlaylistItem {
  return {
    type: 'image',
    id: options.id ?? generateItemId(),
    url,
    duration: options.duration ?? DEFAULT_IMAGE_DURATION_SECONDS,
    behavior: options.behavior ?? PLAY_ONCE,
  };
}

export function videoItem(url: string, options: ItemOptions = {}): VideoPlaylistItem {
  return {
    type: 'video',
    id: options.id ?? generateItemId(),
    url,
    behavior: options.behavior ?? PLAY_ONCE,
  };
}

export function customItem(duration: number, options: ItemOptions = {}): CustomPlaylistItem {
  return {
    type: 'custom',
    id: options.id ?? generateItemId(),
    duration,
    behavior: options.behavior ?? PLAY_ONCE,
  };
}

export function errorItem(options: ItemOptions = {}): ErrorPlaylistItem {
  return {
    type: 'error',
    id: options.id ?? generateItemId(),
    behavior: options.behavior ?? PLAY_ONCE,
  };
}

function behaviorKey(behavior: PlaybackBehavior): string {
  return behavior.type === 'repeat' ? `repeat(${behavior.count})` : behavior.type;
}

/**
 * Stable string key for an item. Two items share a key exactly when
 * `isSameItem` considers them equal.
 */
export function itemKey(item: PlaylistItem): string {
  const behavior = behaviorKey(item.behavior);
  switch (item.type) {
    case 'image':
      return `image:${item.id}:${item.url}:${item.duration}:${behavior}`;
    case 'video':
      return `video:${item.id}:${item.url}:${behavior}`;
    case 'custom':
      return `custom:${item.id}:${item.duration}:${behavior}`;
    case 'error':
      return `error:${item.id}:${behavior}`;
  }
}

export function isSameItem(
  a: PlaylistItem | null | undefined,
  b: PlaylistItem | null | undefined
): boolean {
  if (!a || !b) return !a && !b;
  if (a === b) return true;
  return itemKey(a) === itemKey(b);
}

/** Duration fixed by the item itself; videos report theirs once loaded */
export function getFixedDuration(item: PlaylistItem): number | null {
  switch (item.type) {
    case 'image':
    case 'custom':
      return item.duration;
    case 'video':
    case 'error':
      return null;
  }
}

export function getItemUrl(item: PlaylistItem): string | null {
  return item.type === 'image' || item.type === 'video' ? item.url : null;
}

// ============================================================================
// Schemas
// ============================================================================

const behaviorSchema: z.ZodType<PlaybackBehavior> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('playOnce') }),
  z.object({ type: z.literal('loop') }),
  z.object({ type: z.literal('repeat'), count: z.number().int().min(0) }),
]);

const baseItemShape = {
  id: z.string().min(1).optional(),
  behavior: behaviorSchema.optional(),
};

export const playlistItemInputSchema = z.discriminatedUnion('type', [
  z.object({
    ...baseItemShape,
    type: z.literal('image'),
    url: z.string().min(1),
    duration: z.number().positive().optional(),
  }),
  z.object({
    ...baseItemShape,
    type: z.literal('video'),
    url: z.string().min(1),
  }),
  z.object({
    ...baseItemShape,
    type: z.literal('custom'),
    duration: z.number().positive(),
  }),
  z.object({
    ...baseItemShape,
    type: z.literal('error'),
  }),
]);

export type PlaylistItemInput = z.infer<typeof playlistItemInputSchema>;

function fromInput(input: PlaylistItemInput): PlaylistItem {
  const options = { id: input.id, behavior: input.behavior };
  switch (input.type) {
    case 'image':
      return imageItem(input.url, { ...options, duration: input.duration });
    case 'video':
      return videoItem(input.url, options);
    case 'custom':
      return customItem(input.duration, options);
    case 'error':
      return errorItem(options);
  }
}

/**
 * Parse untrusted item descriptions (e.g. a JSON feed).
 * Entries that fail validation become error items so the playlist keeps its
 * shape and the bad entry auto-advances like any other failure.
 */
export function parsePlaylistItems(input: unknown): PlaylistItem[] {
  const list = z.array(z.unknown()).safeParse(input);
  if (!list.success) return [];

  return list.data.map((entry) => {
    const parsed = playlistItemInputSchema.safeParse(entry);
    return parsed.success ? fromInput(parsed.data) : errorItem();
  });
}
