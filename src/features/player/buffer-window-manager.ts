/**
 * BufferWindowManager - keeps a window of playlist items prepared
 *
 * Core concept: instead of one renderer per playlist item, a fixed pool of
 * `backwardBuffer + forwardBuffer + 1` slots follows the current index. Each
 * slot is bound to the item at its window position; when the index moves, the
 * pool is rotated so slots that already hold an item of the new window keep it,
 * and only the newly exposed positions are prepared again.
 *
 * The slot at offset `backwardBuffer` is the current slot. It is the only one
 * ever played, and its status/progress/duration are projected into the
 * controller's state.
 *
 * Usage:
 *   const manager = new BufferWindowManager({
 *     controller,
 *     createRenderer: () => new VideoElementRenderer(),
 *     imageSource: imageCache,
 *     bandwidthEstimator,
 *   });
 *   // ...
 *   manager.dispose();
 */

import { config, type PlaybackTimings } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import type { PlaylistItem, PlaylistItemStatus, PresentationType, SlotStatus } from '@/types/playlist';
import type { PlaylistController } from '@/features/playlist/playlist-controller';
import {
  selectCurrentItem,
  selectIsLastItem,
  selectRangedItems,
} from '@/features/playlist/stores/playlist-store';
import {
  bufferSizesForBitrate,
  bufferSizesSchema,
  getWindowSize,
  isSameBufferSizes,
  rotate,
  type BufferSizes,
} from '@/features/playlist/utils/buffer-window';
import { isSameItem } from '@/features/playlist/utils/playlist-item';
import type { PlaybackNotifier } from './playback-notifier';
import { RendererSlot, type ImageSource } from './slot/renderer-slot';
import type { MediaRendererFactory } from './types';

const logger = createLogger('BufferWindowManager');

/** Throughput source the pool is sized from */
export interface BandwidthSource {
  readonly lastObservedBitrate: number;
  subscribe(listener: (bitsPerSecond: number) => void): () => void;
}

export interface BufferWindowManagerOptions<TImage> {
  controller: PlaylistController;
  createRenderer: MediaRendererFactory;
  imageSource: ImageSource<TImage>;
  bandwidthEstimator?: BandwidthSource;
  notifier?: PlaybackNotifier;
  /** Default: 'tapThrough' */
  presentation?: PresentationType;
  timings?: Partial<PlaybackTimings>;
}

export interface BufferWindowStats {
  slotCount: number;
  boundSlots: number;
  readySlots: number;
  backwardBuffer: number;
  forwardBuffer: number;
}

function projectStatus(status: SlotStatus): PlaylistItemStatus {
  return status === 'idle' ? 'loading' : status;
}

export class BufferWindowManager<TImage = unknown> {
  readonly presentation: PresentationType;

  private readonly controller: PlaylistController;
  private readonly createRenderer: MediaRendererFactory;
  private readonly imageSource: ImageSource<TImage>;
  private readonly notifier?: PlaybackNotifier;
  private readonly timings: PlaybackTimings;

  private slots: RendererSlot<TImage>[] = [];
  private readonly slotSubscriptions = new Map<RendererSlot<TImage>, Array<() => void>>();
  private subscriptions: Array<() => void> = [];
  private settleTimer: ReturnType<typeof setTimeout> | null = null;
  private itemsDebounceTimer: ReturnType<typeof setTimeout> | null = null;
  private slotCounter = 0;
  private disposed = false;

  constructor(options: BufferWindowManagerOptions<TImage>) {
    this.controller = options.controller;
    this.createRenderer = options.createRenderer;
    this.imageSource = options.imageSource;
    this.notifier = options.notifier;
    this.presentation = options.presentation ?? 'tapThrough';
    this.timings = { ...config.playback, ...options.timings };

    this.subscribeToItems();
    this.initiateSlots();
    this.subscribeToIsPlaying();
    this.subscribeToIsFocused();
    this.subscribeToProgressRequests();
    this.subscribeToCurrentIndex();
    this.subscribeToRate();
    this.prepareCurrentSlot();
    this.subscribeToBandwidth(options.bandwidthEstimator);
    this.applyFocus(this.state.isFocused);
  }

  // ============================================
  // Getters
  // ============================================

  /** The slot at offset `backwardBuffer`, or null after dispose */
  get currentSlot(): RendererSlot<TImage> | null {
    return this.slots[this.state.backwardBuffer] ?? null;
  }

  /** Slots in window order */
  getSlots(): readonly RendererSlot<TImage>[] {
    return this.slots;
  }

  /** The slot bound to an equal item, for layouts that embed surfaces per item */
  getSlotForItem(item: PlaylistItem): RendererSlot<TImage> | null {
    return this.slots.find((slot) => isSameItem(slot.item, item)) ?? null;
  }

  getStats(): BufferWindowStats {
    const { backwardBuffer, forwardBuffer } = this.state;
    return {
      slotCount: this.slots.length,
      boundSlots: this.slots.filter((slot) => slot.item !== null).length,
      readySlots: this.slots.filter((slot) => slot.status === 'ready').length,
      backwardBuffer,
      forwardBuffer,
    };
  }

  private get state() {
    return this.controller.store.getState();
  }

  // ============================================
  // Public operations
  // ============================================

  /**
   * Resize the window. Head changes add or drop slots before the current one,
   * tail changes after it, so the current slot itself is kept.
   *
   * @returns whether the pool changed
   */
  resize(sizes: BufferSizes): boolean {
    if (this.disposed) return false;
    if (!bufferSizesSchema.safeParse(sizes).success) {
      logger.warn(`Ignoring invalid buffer sizes ${sizes.backward}+${sizes.forward}`);
      return false;
    }

    const { backwardBuffer, forwardBuffer } = this.state;
    if (isSameBufferSizes(sizes, { backward: backwardBuffer, forward: forwardBuffer })) {
      return false;
    }

    logger.debug(
      `Resizing window ${backwardBuffer}+${forwardBuffer} -> ${sizes.backward}+${sizes.forward}`
    );

    let slots = [...this.slots];

    if (sizes.backward > backwardBuffer) {
      slots = [...this.createSlots(sizes.backward - backwardBuffer), ...slots];
    } else if (sizes.backward < backwardBuffer) {
      const removed = slots.slice(0, backwardBuffer - sizes.backward);
      slots = slots.slice(backwardBuffer - sizes.backward);
      this.disposeSlots(removed);
    }

    if (sizes.forward > forwardBuffer) {
      slots = [...slots, ...this.createSlots(sizes.forward - forwardBuffer)];
    } else if (sizes.forward < forwardBuffer) {
      const removed = slots.slice(slots.length - (forwardBuffer - sizes.forward));
      slots = slots.slice(0, slots.length - (forwardBuffer - sizes.forward));
      this.disposeSlots(removed);
    }

    this.slots = slots;
    this.state.setBufferSizes(sizes.backward, sizes.forward);

    if (this.state.isFocused && this.state.items.length > 0) {
      this.prepareRelativeSlots();
      this.updateVisibility();
    }
    return true;
  }

  /**
   * Size the window from an observed throughput (bits per second).
   */
  applyBitrate(bitsPerSecond: number): boolean {
    if (!(bitsPerSecond > 0)) return false;
    return this.resize(bufferSizesForBitrate(bitsPerSecond));
  }

  /** Host app moved to the background */
  suspend(): void {
    if (this.state.isPlaying) {
      this.currentSlot?.pause();
    }
  }

  /** Host app came back to the foreground */
  resume(): void {
    if (this.state.isPlaying) {
      this.playCurrentSlot();
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.clearSettleTimer();
    if (this.itemsDebounceTimer !== null) {
      clearTimeout(this.itemsDebounceTimer);
      this.itemsDebounceTimer = null;
    }

    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];

    this.disposeSlots(this.slots);
    this.slots = [];
  }

  // ============================================
  // Slot pool
  // ============================================

  private initiateSlots(): void {
    this.disposeSlots(this.slots);
    const { backwardBuffer, forwardBuffer } = this.state;
    this.slots = this.createSlots(getWindowSize({ backward: backwardBuffer, forward: forwardBuffer }));
  }

  private createSlots(count: number): RendererSlot<TImage>[] {
    const created: RendererSlot<TImage>[] = [];

    for (let i = 0; i < count; i++) {
      const slot = new RendererSlot<TImage>({
        id: `slot-${++this.slotCounter}`,
        renderer: this.createRenderer(),
        imageSource: this.imageSource,
        notifier: this.notifier,
        errorDurationSeconds: this.timings.errorDurationSeconds,
        timerTickMs: this.timings.timerTickMs,
      });
      this.registerSlotSubscriptions(slot);
      created.push(slot);
    }

    return created;
  }

  private disposeSlots(slots: readonly RendererSlot<TImage>[]): void {
    for (const slot of slots) {
      for (const unsubscribe of this.slotSubscriptions.get(slot) ?? []) {
        unsubscribe();
      }
      this.slotSubscriptions.delete(slot);
      slot.dispose();
    }
  }

  private registerSlotSubscriptions(slot: RendererSlot<TImage>): void {
    const isCurrent = () => slot === this.currentSlot;

    this.slotSubscriptions.set(slot, [
      slot.store.subscribe(
        (s) => s.status,
        (status) => {
          if (isCurrent()) this.state.setStatus(projectStatus(status));
        }
      ),
      slot.store.subscribe(
        (s) => s.progressInSeconds,
        (progress) => {
          if (!isCurrent()) return;
          this.state.setProgress(progress);
          this.state.setDuration(slot.durationInSeconds);
        }
      ),
      slot.store.subscribe(
        (s) => s.durationInSeconds,
        (duration) => {
          if (isCurrent()) this.state.setDuration(duration);
        }
      ),
      slot.addEventListener('ended', () => {
        if (isCurrent()) this.handleCurrentItemEnded(slot);
      }),
    ]);
  }

  // ============================================
  // Store subscriptions
  // ============================================

  private subscribeToItems(): void {
    this.subscriptions.push(
      this.controller.subscribe(
        (s) => s.items,
        (items, previous) => {
          if (items.length === 0) return;

          if (previous.length === 0) {
            // First set of items: drop whatever the pool was holding
            for (const slot of this.slots) {
              slot.pause();
              slot.cancel();
            }
          }

          if (this.itemsDebounceTimer !== null) {
            clearTimeout(this.itemsDebounceTimer);
          }
          this.itemsDebounceTimer = setTimeout(() => {
            this.itemsDebounceTimer = null;
            this.applyItems();
          }, this.timings.itemsDebounceMs);
        }
      )
    );
  }

  private subscribeToIsPlaying(): void {
    this.subscriptions.push(
      this.controller.subscribe(
        (s) => s.isPlaying,
        (isPlaying) => {
          if (isPlaying) {
            this.playCurrentSlot();
          } else {
            this.currentSlot?.pause();
          }
        }
      )
    );
  }

  private subscribeToIsFocused(): void {
    this.subscriptions.push(
      this.controller.subscribe(
        (s) => s.isFocused,
        (isFocused) => this.applyFocus(isFocused)
      )
    );
  }

  private subscribeToProgressRequests(): void {
    this.subscriptions.push(
      this.controller.addEventListener('progressrequest', ({ detail }) => {
        this.currentSlot?.setProgress(detail.seconds);
      })
    );
  }

  private subscribeToCurrentIndex(): void {
    this.subscriptions.push(
      this.controller.subscribe(
        (s) => s.currentIndex,
        (index) => this.handleIndexChange(index)
      )
    );
  }

  private subscribeToRate(): void {
    this.subscriptions.push(
      this.controller.subscribe(
        (s) => s.rate,
        (rate) => this.currentSlot?.setRate(rate)
      )
    );
  }

  private subscribeToBandwidth(source: BandwidthSource | undefined): void {
    if (!source) return;

    if (source.lastObservedBitrate > 0) {
      this.applyBitrate(source.lastObservedBitrate);
    }
    this.subscriptions.push(source.subscribe((bitsPerSecond) => this.applyBitrate(bitsPerSecond)));
  }

  // ============================================
  // Reactions
  // ============================================

  private applyFocus(isFocused: boolean): void {
    // Focus drives playing intent; losing it always pauses
    if (isFocused) {
      this.state.play();
    } else {
      this.state.pause();
      this.currentSlot?.pause();
    }

    if (this.state.items.length === 0) return;

    if (isFocused) {
      this.prepareCurrentSlot();
      this.prepareRelativeSlots();
      this.updateVisibility();
    } else {
      this.cancelRelativeSlots();
      this.controller.setProgress(0);
    }
  }

  private applyItems(): void {
    if (this.disposed || this.state.items.length === 0) return;

    this.prepareCurrentSlot();
    const { isFocused, isPlaying } = this.state;

    if (isFocused) {
      this.prepareRelativeSlots();
      this.updateVisibility();
    } else {
      this.cancelRelativeSlots();
    }
    this.projectCurrentSlot();

    if (isFocused && !isPlaying) {
      // The isPlaying subscription starts the current slot
      this.state.play();
    } else if (isPlaying) {
      this.playCurrentSlot();
    }
  }

  private handleIndexChange(index: number): void {
    // Clearing the items resets the index; the pool keeps its bindings
    if (this.state.items.length === 0) return;

    const previousSlot = this.currentSlot;
    previousSlot?.pause();

    this.updateSlots();
    if (previousSlot !== this.currentSlot) {
      previousSlot?.rewind();
    }

    this.projectCurrentSlot();
    this.updateVisibility();
    this.scheduleResume(index);
  }

  private handleCurrentItemEnded(slot: RendererSlot<TImage>): void {
    const state = this.state;
    const item = slot.item;
    if (item) {
      this.controller.dispatchItemReachedEnd(state.currentIndex, item);
    }

    switch (this.presentation) {
      case 'tapThrough':
        if (selectIsLastItem(state)) {
          this.controller.dispatchReachedEnd();
        } else {
          state.advanceToNext();
        }
        break;

      case 'verticalFeed':
        // The feed only moves when the user scrolls
        slot.rewind();
        this.playCurrentSlot();
        break;
    }
  }

  /**
   * Resume the current slot once navigation settles. Dropped when the index
   * moved again in the meantime.
   */
  private scheduleResume(index: number): void {
    this.clearSettleTimer();

    this.settleTimer = setTimeout(() => {
      this.settleTimer = null;
      const state = this.state;
      if (state.currentIndex !== index || !state.isPlaying) return;
      this.playCurrentSlot();
    }, this.timings.settleDelayMs);
  }

  private clearSettleTimer(): void {
    if (this.settleTimer !== null) {
      clearTimeout(this.settleTimer);
      this.settleTimer = null;
    }
  }

  private playCurrentSlot(): void {
    const { isFocused, rate } = this.state;
    const slot = this.currentSlot;
    if (!isFocused || !slot) return;

    slot.setRate(rate);
    slot.playWhenReady();
  }

  // ============================================
  // Window maintenance
  // ============================================

  /**
   * Rotate the pool toward the new window, then bind every position.
   * Rotated survivors already hold their item, so only the exposed positions
   * start loading.
   */
  private updateSlots(): void {
    const window = selectRangedItems(this.state);

    const survivorIndex = this.slots.findIndex(
      (slot) => slot.item !== null && window.some((item) => isSameItem(item, slot.item))
    );

    if (survivorIndex !== -1) {
      const survivor = this.slots[survivorIndex];
      const windowIndex = window.findIndex((item) => isSameItem(item, survivor?.item));
      // diff > 0: moved forward, the first `diff` slots become the new tail.
      // diff < 0: moved backward, the last `-diff` slots become the new head.
      const diff = survivorIndex - windowIndex;
      this.slots = rotate(this.slots, diff);
      logger.debug(`Window shifted by ${diff} to index ${this.state.currentIndex}`);
    }

    window.forEach((item, position) => this.prepareSlotAt(position, item));
  }

  /**
   * While unfocused only the current position is kept prepared.
   */
  private prepareSlotAt(position: number, item: PlaylistItem | null): void {
    const slot = this.slots[position];
    if (!slot) return;

    if (position === this.state.backwardBuffer || this.state.isFocused) {
      slot.prepare(item);
    } else if (slot.item !== null) {
      slot.cancel();
    }
  }

  private prepareCurrentSlot(): void {
    const item = selectCurrentItem(this.state);
    if (item) {
      this.currentSlot?.prepare(item);
    }
  }

  private prepareRelativeSlots(): void {
    const { backwardBuffer } = this.state;
    selectRangedItems(this.state).forEach((item, position) => {
      if (position !== backwardBuffer) {
        this.slots[position]?.prepare(item);
      }
    });
  }

  private cancelRelativeSlots(): void {
    const { backwardBuffer } = this.state;
    this.slots.forEach((slot, position) => {
      if (position !== backwardBuffer) slot.cancel();
    });
  }

  private projectCurrentSlot(): void {
    const slot = this.currentSlot;
    if (!slot) return;

    this.state.setStatus(projectStatus(slot.status));
    this.state.setDuration(slot.durationInSeconds);
    this.state.setProgress(slot.progressInSeconds);
  }

  /**
   * Stacked layouts show only the current slot; paged layouts show every
   * bound slot in its own cell.
   */
  private updateVisibility(): void {
    const current = this.currentSlot;
    for (const slot of this.slots) {
      const isVisible =
        this.presentation === 'tapThrough' ? slot === current : slot.item !== null;
      slot.setVisible(isVisible);
    }
  }
}
