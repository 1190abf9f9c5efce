/**
 * RendererSlot - one entry of the renderer pool
 *
 * Owns a single MediaRenderer and binds it to at most one playlist item.
 * Handles:
 * - Per-type preparation (image fetch, video open, timed placeholders)
 * - Playback, including the progress timer for non-video items
 * - Loop/repeat behaviors before the end of an item is reported
 * - Discarding async results that arrive after the slot was rebound
 *
 * Status moves idle → loading → ready | error, and back to idle on cancel.
 */

import { EventEmitter } from '@/lib/event-emitter';
import { PlaylistLoadError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import type { PlaylistItem, SlotStatus } from '@/types/playlist';
import type { ImageFetchResult } from '@/features/media/image-cache';
import { isSameItem } from '@/features/playlist/utils/playlist-item';
import type { PlaybackNotifier } from '../playback-notifier';
import type { MediaRenderer, MediaRendererEventMap, SlotState } from '../types';
import { createSlotStore, type SlotStore } from './slot-store';

const logger = createLogger('RendererSlot');

/** Seconds of video to buffer ahead when a slot opens a video */
export const PREFERRED_FORWARD_BUFFER_SECONDS = 2.5;

export interface ImageSource<TImage> {
  fetch(url: string): Promise<ImageFetchResult<TImage>>;
}

export interface RendererSlotOptions<TImage> {
  id: string;
  renderer: MediaRenderer;
  imageSource: ImageSource<TImage>;
  notifier?: PlaybackNotifier;
  /** Duration given to items that failed to load */
  errorDurationSeconds: number;
  /** Progress timer tick for non-video items */
  timerTickMs: number;
}

export type RendererSlotEventMap = {
  /** The bound item finished, after loop/repeat behaviors were applied */
  ended: { item: PlaylistItem };
};

/** NaN and Infinity become 0 */
export function normalizeDuration(seconds: number): number {
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

function roundSeconds(seconds: number): number {
  return Math.round(seconds * 1_000_000) / 1_000_000;
}

export class RendererSlot<TImage = unknown> extends EventEmitter<RendererSlotEventMap> {
  readonly id: string;
  readonly store: SlotStore;

  private readonly renderer: MediaRenderer;
  private readonly imageSource: ImageSource<TImage>;
  private readonly notifier?: PlaybackNotifier;
  private readonly errorDurationSeconds: number;
  private readonly timerTickMs: number;

  // Bumped on every rebind/cancel; async completions compare against it
  private generation = 0;
  private rate = 1;
  private image: TImage | null = null;
  private pendingPlay = false;
  private completedRepeats = 0;
  private timerId: ReturnType<typeof setInterval> | null = null;
  private rendererSubscriptions: Array<() => void> = [];
  private pendingWork: Promise<void> = Promise.resolve();
  private disposed = false;

  constructor(options: RendererSlotOptions<TImage>) {
    super();
    this.id = options.id;
    this.renderer = options.renderer;
    this.imageSource = options.imageSource;
    this.notifier = options.notifier;
    this.errorDurationSeconds = options.errorDurationSeconds;
    this.timerTickMs = options.timerTickMs;
    this.store = createSlotStore();
  }

  // ============================================
  // Getters
  // ============================================

  get item(): PlaylistItem | null {
    return this.store.getState().item;
  }

  get status(): SlotStatus {
    return this.store.getState().status;
  }

  get progressInSeconds(): number {
    return this.store.getState().progressInSeconds;
  }

  get durationInSeconds(): number {
    return this.store.getState().durationInSeconds;
  }

  get isVisible(): boolean {
    return this.store.getState().isVisible;
  }

  /** Decoded image for image items once loaded */
  get currentImage(): TImage | null {
    return this.image;
  }

  get playbackRate(): number {
    return this.rate;
  }

  /** True while the progress timer of a non-video item is running */
  get isTimerRunning(): boolean {
    return this.timerId !== null;
  }

  /** Surface for presentation layers */
  get mediaRenderer(): MediaRenderer {
    return this.renderer;
  }

  /** Settles once the latest image fetch or seek has been applied or discarded */
  whenIdle(): Promise<void> {
    return this.pendingWork;
  }

  // ============================================
  // Binding
  // ============================================

  /**
   * Bind the slot to an item and start loading it without playing.
   * A no-op when the slot is already bound to an equal item.
   */
  prepare(item: PlaylistItem | null): void {
    if (this.disposed || isSameItem(item, this.item)) return;

    this.cancel();
    if (!item) return;

    logger.debug(`${this.id} prepare ${item.type} ${item.id}`);
    this.setState({ item, status: 'loading', progressInSeconds: 0 });

    switch (item.type) {
      case 'image':
        this.setState({ durationInSeconds: item.duration });
        this.loadImage(item.url);
        break;

      case 'video':
        this.openVideo(item.url);
        break;

      case 'custom':
        this.setState({ durationInSeconds: item.duration, status: 'ready' });
        break;

      case 'error':
        this.setState({ durationInSeconds: this.errorDurationSeconds, status: 'error' });
        break;
    }
  }

  /**
   * Unbind and release everything the current item holds.
   */
  cancel(): void {
    this.generation++;
    this.pendingPlay = false;
    this.completedRepeats = 0;
    this.image = null;
    this.stopTimer();
    this.detachRenderer();
    this.renderer.unload();
    this.setState({ item: null, status: 'idle', progressInSeconds: 0, durationInSeconds: 0 });
  }

  // ============================================
  // Playback
  // ============================================

  /**
   * Start playback now, or as soon as the bound video is ready.
   */
  playWhenReady(): void {
    const item = this.item;
    if (!item) return;

    switch (item.type) {
      case 'image':
      case 'custom':
      case 'error':
        this.startTimer();
        break;

      case 'video':
        if (this.renderer.isPlaying) return;
        this.notifier?.dispatchVideoRequested(item.url);

        if (this.renderer.isReadyForDisplay) {
          this.startVideo();
        } else if (this.status === 'error') {
          // Failed videos still run out their fallback duration
          this.startTimer();
        } else {
          this.pendingPlay = true;
        }
        break;
    }
  }

  pause(): void {
    this.pendingPlay = false;
    this.stopTimer();
    this.renderer.pause();
  }

  /**
   * Return to the start of the item and forget completed repeats.
   */
  rewind(): void {
    this.completedRepeats = 0;
    this.restartFromBeginning();
  }

  /**
   * Move the playhead. Non-video items take the value as their timer offset.
   */
  setProgress(seconds: number): void {
    const item = this.item;
    if (!item || !Number.isFinite(seconds)) return;

    if (item.type !== 'video') {
      this.setState({ progressInSeconds: Math.max(0, seconds) });
      return;
    }

    this.seekVideo(seconds);
  }

  setRate(rate: number): void {
    if (!Number.isFinite(rate) || rate < 0) return;
    this.rate = rate;
    if (this.item?.type === 'video') {
      this.renderer.setRate(rate);
    }
  }

  setVisible(isVisible: boolean): void {
    this.setState({ isVisible });
  }

  /**
   * Release the renderer for good. The slot cannot be reused afterwards.
   */
  dispose(): void {
    if (this.disposed) return;
    this.cancel();
    this.disposed = true;
    this.renderer.dispose();
    this.removeAllListeners();
  }

  // ============================================
  // Private
  // ============================================

  private setState(partial: Partial<SlotState>): void {
    this.store.setState(partial);
  }

  private isCurrent(generation: number): boolean {
    return generation === this.generation && !this.disposed;
  }

  private loadImage(url: string): void {
    const generation = this.generation;

    this.pendingWork = this.imageSource
      .fetch(url)
      .then((result) => {
        if (!this.isCurrent(generation)) {
          logger.debug(`${this.id} discarded stale image result for ${url}`);
          return;
        }

        if (result.ok) {
          this.image = result.image;
          this.setState({ status: 'ready' });
        } else {
          this.setState({ status: 'error', durationInSeconds: this.errorDurationSeconds });
        }
      })
      .catch((error: unknown) => {
        logger.error(`${this.id} image load handler failed:`, error);
      });
  }

  private openVideo(url: string): void {
    const generation = this.generation;
    this.attachRenderer(url, generation);
    this.renderer.load(url, { preferredForwardBufferDuration: PREFERRED_FORWARD_BUFFER_SECONDS });
  }

  private attachRenderer(url: string, generation: number): void {
    this.detachRenderer();

    const guard =
      <E extends keyof MediaRendererEventMap>(handler: (payload: MediaRendererEventMap[E]) => void) =>
      (payload: MediaRendererEventMap[E]) => {
        if (this.isCurrent(generation)) handler(payload);
      };

    this.rendererSubscriptions = [
      this.renderer.on(
        'status',
        guard<'status'>(({ status, error }) => this.handleVideoStatus(url, status, error))
      ),
      this.renderer.on(
        'timeupdate',
        guard<'timeupdate'>(({ seconds }) => this.setState({ progressInSeconds: seconds }))
      ),
      this.renderer.on(
        'playing',
        guard<'playing'>(() => {
          if (this.status !== 'error') this.setState({ status: 'ready' });
          this.notifier?.dispatchVideoStarted(url);
        })
      ),
      this.renderer.on(
        'stalled',
        guard<'stalled'>(() => {
          this.notifier?.dispatchVideoStalled(url);
        })
      ),
      this.renderer.on(
        'ended',
        guard<'ended'>(() => this.handleNaturalEnd())
      ),
    ];
  }

  private detachRenderer(): void {
    for (const unsubscribe of this.rendererSubscriptions) {
      unsubscribe();
    }
    this.rendererSubscriptions = [];
  }

  private handleVideoStatus(
    url: string,
    status: MediaRendererEventMap['status']['status'],
    error: Error | undefined
  ): void {
    switch (status) {
      case 'ready':
        this.setState({
          status: 'ready',
          durationInSeconds: normalizeDuration(this.renderer.duration),
        });
        if (this.pendingPlay) this.startVideo();
        break;

      case 'failed': {
        const loadError = new PlaylistLoadError(
          `Failed to load video: ${error?.message ?? 'Unknown error'}`,
          'video',
          url,
          { cause: error }
        );
        logger.warn(`${this.id} ${loadError.message} (${url})`);
        this.setState({ status: 'error', durationInSeconds: this.errorDurationSeconds });
        this.notifier?.dispatchVideoError(url, loadError);

        if (this.pendingPlay) {
          this.pendingPlay = false;
          this.startTimer();
        }
        break;
      }

      case 'loading':
        // A loaded video only returns to loading through a rebind
        if (this.status === 'loading') return;
        logger.debug(`${this.id} ignored loading status while ${this.status}`);
        break;
    }
  }

  private startVideo(): void {
    this.pendingPlay = false;
    this.renderer.play();
    this.renderer.setRate(this.rate);
  }

  private seekVideo(seconds: number): void {
    const generation = this.generation;

    this.pendingWork = this.renderer
      .seek(Math.max(0, seconds))
      .then((time) => {
        if (this.isCurrent(generation)) {
          this.setState({ progressInSeconds: time });
        }
      })
      .catch((error: unknown) => {
        logger.warn(`${this.id} seek failed:`, error);
      });
  }

  private startTimer(): void {
    this.stopTimer();
    const stepSeconds = this.timerTickMs / 1000;

    this.timerId = setInterval(() => {
      const progress = roundSeconds(this.progressInSeconds + stepSeconds * this.rate);
      this.setState({ progressInSeconds: progress });

      if (progress >= this.durationInSeconds) {
        this.stopTimer();
        this.handleNaturalEnd();
      }
    }, this.timerTickMs);
  }

  private stopTimer(): void {
    if (this.timerId !== null) {
      clearInterval(this.timerId);
      this.timerId = null;
    }
  }

  private handleNaturalEnd(): void {
    const item = this.item;
    if (!item) return;

    const { behavior } = item;
    if (behavior.type === 'loop') {
      this.replay();
      return;
    }

    if (behavior.type === 'repeat' && this.completedRepeats < behavior.count) {
      this.completedRepeats++;
      this.replay();
      return;
    }

    this.dispatchEvent('ended', { item });
  }

  private replay(): void {
    this.restartFromBeginning();
    this.playWhenReady();
  }

  private restartFromBeginning(): void {
    this.stopTimer();
    this.setState({ progressInSeconds: 0 });

    if (this.item?.type === 'video' && this.status !== 'error') {
      this.seekVideo(0);
    }
  }
}
