import { describe, expect, it, beforeEach, vi } from 'vitest';
import { customItem, imageItem } from '../utils/playlist-item';
import {
  createPlaylistStore,
  selectCurrentItem,
  selectIsLastItem,
  selectRangedItems,
  type PlaylistStore,
} from './playlist-store';

const a = customItem(3, { id: 'a' });
const b = customItem(3, { id: 'b' });
const c = customItem(3, { id: 'c' });

describe('playlist-store', () => {
  let store: PlaylistStore;

  beforeEach(() => {
    store = createPlaylistStore({ items: [a, b, c], backwardBuffer: 1, forwardBuffer: 1 });
  });

  it('should have correct initial state', () => {
    const state = store.getState();
    expect(state.currentIndex).toBe(0);
    expect(state.rate).toBe(1);
    expect(state.isPlaying).toBe(false);
    expect(state.isFocused).toBe(false);
    expect(state.status).toBe('ready');
    expect(state.progressInSeconds).toBe(0);
    expect(state.durationInSeconds).toBe(0);
    expect(state.setIndexWithAnimation).toBe(false);
  });

  describe('construction', () => {
    it('should fall back to 0 for an out-of-range index with items', () => {
      const s = createPlaylistStore({ items: [a, b], initialIndex: 7, backwardBuffer: 1, forwardBuffer: 1 });
      expect(s.getState().currentIndex).toBe(0);
    });

    it('should fall back to 0 for a negative index with items', () => {
      const s = createPlaylistStore({ items: [a, b], initialIndex: -1, backwardBuffer: 1, forwardBuffer: 1 });
      expect(s.getState().currentIndex).toBe(0);
    });

    it('should keep any index while items are empty', () => {
      const s = createPlaylistStore({ items: [], initialIndex: 7, backwardBuffer: 1, forwardBuffer: 1 });
      expect(s.getState().currentIndex).toBe(7);
      expect(selectCurrentItem(s.getState())).toBeNull();
    });

    it('should keep a valid initial index', () => {
      const s = createPlaylistStore({ items: [a, b, c], initialIndex: 2, backwardBuffer: 1, forwardBuffer: 1 });
      expect(s.getState().currentIndex).toBe(2);
    });
  });

  describe('navigation', () => {
    it('should advance and clamp at the last item', () => {
      store.getState().advanceToNext();
      store.getState().advanceToNext();
      expect(store.getState().currentIndex).toBe(2);

      const before = store.getState();
      store.getState().advanceToNext();
      expect(store.getState().currentIndex).toBe(2);
      expect(store.getState()).toBe(before);
    });

    it('should move back and clamp at the first item', () => {
      store.getState().setCurrentIndex(1);
      store.getState().moveToPrevious();
      expect(store.getState().currentIndex).toBe(0);

      store.getState().moveToPrevious();
      expect(store.getState().currentIndex).toBe(0);
    });

    it('should ignore navigation on an empty playlist', () => {
      const s = createPlaylistStore({ items: [], initialIndex: 3, backwardBuffer: 1, forwardBuffer: 1 });
      s.getState().advanceToNext();
      s.getState().moveToPrevious();
      expect(s.getState().currentIndex).toBe(3);
    });

    it('should jump to a valid index and record the animation hint', () => {
      store.getState().setCurrentIndex(2, true);
      expect(store.getState().currentIndex).toBe(2);
      expect(store.getState().setIndexWithAnimation).toBe(true);

      store.getState().setCurrentIndex(0);
      expect(store.getState().setIndexWithAnimation).toBe(false);
    });

    it('should ignore out-of-range and current indices', () => {
      const before = store.getState();
      store.getState().setCurrentIndex(3);
      store.getState().setCurrentIndex(-1);
      store.getState().setCurrentIndex(0, true);
      expect(store.getState()).toBe(before);
    });
  });

  describe('setItems', () => {
    it('should keep a still-valid index', () => {
      store.getState().setCurrentIndex(1);
      store.getState().setItems([c, b, a, a]);
      expect(store.getState().currentIndex).toBe(1);
    });

    it('should reset an index that no longer fits', () => {
      store.getState().setCurrentIndex(2);
      store.getState().setItems([a]);
      expect(store.getState().currentIndex).toBe(0);
    });

    it('should reset the index when items are cleared', () => {
      store.getState().setCurrentIndex(2);
      store.getState().setItems([]);
      expect(store.getState().currentIndex).toBe(0);
    });
  });

  describe('playback controls', () => {
    it('should play and pause', () => {
      store.getState().play();
      expect(store.getState().isPlaying).toBe(true);

      store.getState().pause();
      expect(store.getState().isPlaying).toBe(false);
    });

    it('should turn playback on for a positive rate', () => {
      store.getState().setRate(2);
      expect(store.getState().rate).toBe(2);
      expect(store.getState().isPlaying).toBe(true);
    });

    it('should keep playing intent for a zero rate', () => {
      store.getState().setRate(0);
      expect(store.getState().rate).toBe(0);
      expect(store.getState().isPlaying).toBe(false);
    });

    it('should ignore non-finite and negative rates', () => {
      const before = store.getState();

      store.getState().setRate(Number.NaN);
      store.getState().setRate(Number.POSITIVE_INFINITY);
      store.getState().setRate(-1);

      expect(store.getState()).toBe(before);
      expect(store.getState().rate).toBe(1);
    });

    it('should set focus', () => {
      store.getState().setFocus(true);
      expect(store.getState().isFocused).toBe(true);
    });
  });

  describe('projection setters', () => {
    it('should normalize non-finite progress and duration to 0', () => {
      store.getState().setProgress(4);
      store.getState().setProgress(Number.NaN);
      store.getState().setDuration(Number.POSITIVE_INFINITY);
      expect(store.getState().progressInSeconds).toBe(0);
      expect(store.getState().durationInSeconds).toBe(0);
    });

    it('should avoid state updates for unchanged values', () => {
      store.getState().setStatus('loading');
      store.getState().setProgress(1.5);
      store.getState().setBufferSizes(2, 3);
      const before = store.getState();

      store.getState().setStatus('loading');
      store.getState().setProgress(1.5);
      store.getState().setBufferSizes(2, 3);
      store.getState().setFocus(false);
      store.getState().pause();
      expect(store.getState()).toBe(before);
    });
  });

  describe('selector subscriptions', () => {
    it('should notify only when the selected value changes', () => {
      const listener = vi.fn();
      store.subscribe((s) => s.currentIndex, listener);

      store.getState().setProgress(2);
      store.getState().advanceToNext();
      store.getState().setRate(1.5);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(1, 0);
    });
  });

  describe('selectors', () => {
    it('should map the window around the current index', () => {
      expect(selectRangedItems(store.getState())).toEqual([null, a, b]);

      store.getState().setCurrentIndex(2);
      expect(selectRangedItems(store.getState())).toEqual([b, c, null]);
      expect(selectCurrentItem(store.getState())).toBe(c);
      expect(selectIsLastItem(store.getState())).toBe(true);
    });

    it('should report no last item on an empty playlist', () => {
      const s = createPlaylistStore({ items: [], backwardBuffer: 1, forwardBuffer: 1 });
      expect(selectIsLastItem(s.getState())).toBe(false);
      expect(selectRangedItems(s.getState())).toEqual([null, null, null]);
    });

    it('should look items up by position, not identity', () => {
      const image = imageItem('https://cdn.test/1.jpg', { id: 'img' });
      const s = createPlaylistStore({ items: [image, image], initialIndex: 1, backwardBuffer: 1, forwardBuffer: 0 });
      expect(selectRangedItems(s.getState())).toEqual([image, image]);
    });
  });
});
