import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { SlotState } from '../types';

export const INITIAL_SLOT_STATE: SlotState = {
  item: null,
  status: 'idle',
  progressInSeconds: 0,
  durationInSeconds: 0,
  isVisible: false,
};

export type SlotStore = ReturnType<typeof createSlotStore>;

/**
 * Observable state of one renderer slot.
 * Selector subscriptions only fire when the selected value changes.
 */
export function createSlotStore() {
  return createStore<SlotState>()(subscribeWithSelector(() => ({ ...INITIAL_SLOT_STATE })));
}
