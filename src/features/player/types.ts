import type { PlaylistItem, SlotStatus } from '@/types/playlist';

/** Readiness reported by a media renderer for its loaded source */
export type MediaRendererStatus = 'loading' | 'ready' | 'failed';

export type MediaRendererEventMap = {
  status: { status: MediaRendererStatus; error?: Error };
  timeupdate: { seconds: number };
  playing: Record<string, never>;
  stalled: Record<string, never>;
  ended: Record<string, never>;
};

export type MediaRendererEventType = keyof MediaRendererEventMap;

export interface MediaLoadOptions {
  /** Seconds of media to buffer ahead of the playhead */
  preferredForwardBufferDuration?: number;
}

/**
 * One decode/render surface, supplied by the host (a video element, a native
 * player handle, ...). One instance per pool slot.
 */
export interface MediaRenderer {
  /** Seconds; NaN or Infinity while unknown */
  readonly duration: number;
  readonly currentTime: number;
  /** True once the first frame can be shown */
  readonly isReadyForDisplay: boolean;
  /** True while the playhead is moving */
  readonly isPlaying: boolean;

  load(url: string, options?: MediaLoadOptions): void;
  /** Drop the current source and any pending preroll */
  unload(): void;
  play(): void;
  pause(): void;
  setRate(rate: number): void;
  /** Resolves with the playhead position after the seek settles */
  seek(seconds: number): Promise<number>;
  on<E extends MediaRendererEventType>(
    event: E,
    listener: (payload: MediaRendererEventMap[E]) => void
  ): () => void;
  /** Release the surface for good */
  dispose(): void;
}

export type MediaRendererFactory = () => MediaRenderer;

export interface SlotState {
  item: PlaylistItem | null;
  status: SlotStatus;
  progressInSeconds: number;
  durationInSeconds: number;
  isVisible: boolean;
}
