import type { PlaylistItem, PlaylistItemStatus } from '@/types/playlist';

export interface PlaylistState {
  items: PlaylistItem[];
  currentIndex: number;
  /** Desired playback rate for the current item */
  rate: number;
  isFocused: boolean;
  /** Playing intent; has no renderer effect while unfocused */
  isPlaying: boolean;
  status: PlaylistItemStatus;
  progressInSeconds: number;
  durationInSeconds: number;
  backwardBuffer: number;
  forwardBuffer: number;
  /** Hint for paged layouts: animate the scroll to the new index */
  setIndexWithAnimation: boolean;
}

export interface PlaylistActions {
  setItems: (items: PlaylistItem[]) => void;
  advanceToNext: () => void;
  moveToPrevious: () => void;
  setCurrentIndex: (index: number, animated?: boolean) => void;
  setFocus: (isFocused: boolean) => void;
  setRate: (rate: number) => void;
  play: () => void;
  pause: () => void;
  /** Projection setters, driven by the buffer window manager */
  setStatus: (status: PlaylistItemStatus) => void;
  setProgress: (progressInSeconds: number) => void;
  setDuration: (durationInSeconds: number) => void;
  setBufferSizes: (backwardBuffer: number, forwardBuffer: number) => void;
}

export type PlaylistStoreState = PlaylistState & PlaylistActions;

export interface PlaylistStoreInit {
  items?: PlaylistItem[];
  initialIndex?: number;
  backwardBuffer: number;
  forwardBuffer: number;
  isFocused?: boolean;
  isPlaying?: boolean;
}
