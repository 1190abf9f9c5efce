/**
 * PlaylistController - public surface of a playlist session
 *
 * Holds the item list, the current index and the playing/focused intent, and
 * exposes the projected state of the current item. A BufferWindowManager
 * attached to the controller turns these intents into renderer work.
 *
 * Usage:
 *   const controller = new PlaylistController({ items, isFocused: true });
 *   controller.subscribe((s) => s.currentIndex, (index) => render(index));
 *   controller.addEventListener('reachedEnd', () => closeStories());
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { config } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import type { PlaylistItem, PlaylistItemStatus } from '@/types/playlist';
import { PlaylistEmitter } from './playlist-emitter';
import {
  createPlaylistStore,
  selectCurrentItem,
  selectRangedItems,
  type PlaylistStore,
} from './stores/playlist-store';
import type { PlaylistState } from './types';

const logger = createLogger('PlaylistController');

export interface PlaylistControllerOptions {
  /** Correlates this controller in logs and host code (default: generated) */
  id?: string;
  items?: PlaylistItem[];
  /** Falls back to 0 when out of range, unless `items` is empty */
  initialIndex?: number;
  /** Items kept prepared before the current one */
  backwardBuffer?: number;
  /** Items kept prepared after the current one */
  forwardBuffer?: number;
  isFocused?: boolean;
  isPlaying?: boolean;
}

export interface SubscribeOptions<T> {
  equalityFn?: (a: T, b: T) => boolean;
  fireImmediately?: boolean;
}

const bufferSizeSchema = z.number().int().min(0);
const indexSchema = z.number().int();
const secondsSchema = z.number().finite();
const rateSchema = z.number().finite().min(0);

function resolveBufferSize(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  const parsed = bufferSizeSchema.safeParse(value);
  if (parsed.success) return parsed.data;

  logger.warn(`Invalid ${name} ${value}, using ${fallback}`);
  return fallback;
}

export class PlaylistController extends PlaylistEmitter {
  readonly id: string;
  readonly store: PlaylistStore;

  constructor(options: PlaylistControllerOptions = {}) {
    super();
    this.id = options.id ?? randomUUID();

    const initialIndex = indexSchema.safeParse(options.initialIndex ?? 0);

    this.store = createPlaylistStore({
      items: options.items ?? [],
      initialIndex: initialIndex.success ? initialIndex.data : 0,
      backwardBuffer: resolveBufferSize(options.backwardBuffer, config.buffer.backward, 'backwardBuffer'),
      forwardBuffer: resolveBufferSize(options.forwardBuffer, config.buffer.forward, 'forwardBuffer'),
      isFocused: options.isFocused ?? false,
      isPlaying: options.isPlaying ?? false,
    });
  }

  // ============================================
  // Observable state
  // ============================================

  getState(): PlaylistState {
    return this.store.getState();
  }

  get items(): PlaylistItem[] {
    return this.getState().items;
  }

  get currentIndex(): number {
    return this.getState().currentIndex;
  }

  get rate(): number {
    return this.getState().rate;
  }

  get isFocused(): boolean {
    return this.getState().isFocused;
  }

  get isPlaying(): boolean {
    return this.getState().isPlaying;
  }

  get status(): PlaylistItemStatus {
    return this.getState().status;
  }

  get progressInSeconds(): number {
    return this.getState().progressInSeconds;
  }

  get durationInSeconds(): number {
    return this.getState().durationInSeconds;
  }

  get backwardBuffer(): number {
    return this.getState().backwardBuffer;
  }

  get forwardBuffer(): number {
    return this.getState().forwardBuffer;
  }

  get setIndexWithAnimation(): boolean {
    return this.getState().setIndexWithAnimation;
  }

  /** Items of the buffer window; positions outside the playlist are null */
  get rangedItems(): Array<PlaylistItem | null> {
    return selectRangedItems(this.getState());
  }

  get currentItem(): PlaylistItem | null {
    return selectCurrentItem(this.getState());
  }

  /**
   * Listen to one slice of state. The listener runs only when the selected
   * value changes and always receives the latest value.
   */
  subscribe<T>(
    selector: (state: PlaylistState) => T,
    listener: (value: T, previous: T) => void,
    options?: SubscribeOptions<T>
  ): () => void {
    return this.store.subscribe(selector, listener, options);
  }

  // ============================================
  // Mutators
  // ============================================

  /**
   * Replace the playlist. The current index resets to 0 when it is not valid
   * for the new items.
   */
  setItems(items: PlaylistItem[]): void {
    this.store.getState().setItems(items);
  }

  /** Advance one item; stays on the last item */
  advanceToNext(): void {
    this.store.getState().advanceToNext();
  }

  /** Go back one item; stays on the first item */
  moveToPrevious(): void {
    this.store.getState().moveToPrevious();
  }

  /**
   * Jump to an index. Ignored when out of range or already current.
   *
   * @param animated - Paged layouts animate the scroll; stacked ones switch immediately
   */
  setCurrentIndex(index: number, animated = false): void {
    this.store.getState().setCurrentIndex(index, animated);
  }

  /** Reflect whether the playlist surface is visible to the user */
  setFocus(isFocused: boolean): void {
    this.store.getState().setFocus(isFocused);
  }

  play(): void {
    this.store.getState().play();
  }

  pause(): void {
    this.store.getState().pause();
  }

  /** A positive rate also turns playback on */
  setRate(rate: number): void {
    const parsed = rateSchema.safeParse(rate);
    if (!parsed.success) {
      logger.warn(`Ignoring invalid rate ${rate}`);
      return;
    }
    this.store.getState().setRate(parsed.data);
  }

  /** Ask the current item to move its playhead */
  setProgress(seconds: number): void {
    const parsed = secondsSchema.safeParse(seconds);
    if (!parsed.success) {
      logger.warn(`Ignoring invalid progress ${seconds}`);
      return;
    }
    this.dispatchProgressRequest(parsed.data);
  }
}
