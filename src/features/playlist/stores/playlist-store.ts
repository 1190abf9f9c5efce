import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { PlaylistItem } from '@/types/playlist';
import type { PlaylistState, PlaylistStoreInit, PlaylistStoreState } from '../types';
import { getWindowItems } from '../utils/buffer-window';

// Subscribe with a selector so listeners only hear about the field they read:
//
//   store.subscribe((s) => s.currentIndex, (index) => { ... });
//
// The middleware compares with Object.is, so repeated equal values are dropped.

function isValidIndex(items: readonly PlaylistItem[], index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < items.length;
}

function resolveInitialIndex(items: readonly PlaylistItem[], index: number): number {
  // An out-of-range index is tolerated until items arrive
  if (items.length === 0 || isValidIndex(items, index)) return index;
  return 0;
}

function normalizeSeconds(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

export type PlaylistStore = ReturnType<typeof createPlaylistStore>;

export function createPlaylistStore(init: PlaylistStoreInit) {
  const items = init.items ?? [];

  return createStore<PlaylistStoreState>()(
    subscribeWithSelector((set, get) => ({
      // State
      items,
      currentIndex: resolveInitialIndex(items, init.initialIndex ?? 0),
      rate: 1,
      isFocused: init.isFocused ?? false,
      isPlaying: init.isPlaying ?? false,
      status: 'ready',
      progressInSeconds: 0,
      durationInSeconds: 0,
      backwardBuffer: init.backwardBuffer,
      forwardBuffer: init.forwardBuffer,
      setIndexWithAnimation: false,

      // Actions
      setItems: (newItems) => {
        const { currentIndex } = get();
        set({
          items: newItems,
          currentIndex: isValidIndex(newItems, currentIndex) ? currentIndex : 0,
        });
      },

      advanceToNext: () => {
        const { items: current, currentIndex } = get();
        if (current.length === 0) return;
        const next = Math.min(currentIndex + 1, current.length - 1);
        if (next !== currentIndex) set({ currentIndex: next });
      },

      moveToPrevious: () => {
        const { items: current, currentIndex } = get();
        if (current.length === 0) return;
        const previous = Math.max(currentIndex - 1, 0);
        if (previous !== currentIndex) set({ currentIndex: previous });
      },

      setCurrentIndex: (index, animated = false) => {
        const { items: current, currentIndex } = get();
        if (index === currentIndex || !isValidIndex(current, index)) return;
        set({ setIndexWithAnimation: animated, currentIndex: index });
      },

      setFocus: (isFocused) => {
        if (get().isFocused !== isFocused) set({ isFocused });
      },

      setRate: (rate) => {
        if (!Number.isFinite(rate) || rate < 0) return;
        const state = get();
        const isPlaying = rate > 0 ? true : state.isPlaying;
        if (state.rate === rate && state.isPlaying === isPlaying) return;
        set({ rate, isPlaying });
      },

      play: () => {
        if (!get().isPlaying) set({ isPlaying: true });
      },

      pause: () => {
        if (get().isPlaying) set({ isPlaying: false });
      },

      setStatus: (status) => {
        if (get().status !== status) set({ status });
      },

      setProgress: (progressInSeconds) => {
        const value = normalizeSeconds(progressInSeconds);
        if (get().progressInSeconds !== value) set({ progressInSeconds: value });
      },

      setDuration: (durationInSeconds) => {
        const value = normalizeSeconds(durationInSeconds);
        if (get().durationInSeconds !== value) set({ durationInSeconds: value });
      },

      setBufferSizes: (backwardBuffer, forwardBuffer) => {
        const state = get();
        if (state.backwardBuffer === backwardBuffer && state.forwardBuffer === forwardBuffer) return;
        set({ backwardBuffer, forwardBuffer });
      },
    }))
  );
}

// ============================================================================
// Selectors
// ============================================================================

export function selectRangedItems(state: PlaylistState): Array<PlaylistItem | null> {
  return getWindowItems(state.items, state.currentIndex, {
    backward: state.backwardBuffer,
    forward: state.forwardBuffer,
  });
}

export function selectCurrentItem(state: PlaylistState): PlaylistItem | null {
  return isValidIndex(state.items, state.currentIndex)
    ? state.items[state.currentIndex] ?? null
    : null;
}

export function selectIsLastItem(state: PlaylistState): boolean {
  return state.items.length > 0 && state.currentIndex === state.items.length - 1;
}
