import { z } from 'zod';
import type { PlaylistItem } from '@/types/playlist';

export const bufferSizesSchema = z.object({
  backward: z.number().int().min(0),
  forward: z.number().int().min(0),
});

export type BufferSizes = z.infer<typeof bufferSizesSchema>;

export const FORWARD_BUFFER_RANGE = { min: 1, max: 5 } as const;
export const BACKWARD_BUFFER_RANGE = { min: 1, max: 2 } as const;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Items at positions [currentIndex - backward, currentIndex + forward].
 * Positions outside the playlist map to null.
 */
export function getWindowItems(
  items: readonly PlaylistItem[],
  currentIndex: number,
  sizes: BufferSizes
): Array<PlaylistItem | null> {
  const window: Array<PlaylistItem | null> = [];
  for (let index = currentIndex - sizes.backward; index <= currentIndex + sizes.forward; index++) {
    window.push(index >= 0 && index < items.length ? items[index] ?? null : null);
  }
  return window;
}

export function getWindowSize(sizes: BufferSizes): number {
  return sizes.backward + sizes.forward + 1;
}

/**
 * Buffer sizes for an observed throughput in bits per second.
 * One forward slot per whole Mbps, half that backward; each clamped on its own.
 */
export function bufferSizesForBitrate(bitsPerSecond: number): BufferSizes {
  const mbps = Math.floor(bitsPerSecond / 1_000_000);
  return {
    forward: clamp(mbps, FORWARD_BUFFER_RANGE.min, FORWARD_BUFFER_RANGE.max),
    backward: clamp(Math.floor(mbps / 2), BACKWARD_BUFFER_RANGE.min, BACKWARD_BUFFER_RANGE.max),
  };
}

export function isSameBufferSizes(a: BufferSizes, b: BufferSizes): boolean {
  return a.backward === b.backward && a.forward === b.forward;
}

/** Move the first `count` entries to the end (count > 0) or the last `-count` to the front. */
export function rotate<T>(entries: readonly T[], count: number): T[] {
  if (entries.length === 0 || count === 0) return [...entries];
  const shift = ((count % entries.length) + entries.length) % entries.length;
  return [...entries.slice(shift), ...entries.slice(0, shift)];
}
