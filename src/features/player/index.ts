// Player feature: public API
// Renderer slot pool driven by a playlist controller

export { BufferWindowManager } from './buffer-window-manager';
export type {
  BandwidthSource,
  BufferWindowManagerOptions,
  BufferWindowStats,
} from './buffer-window-manager';
export { PlaybackNotifier } from './playback-notifier';
export type {
  PlaybackNotificationMap,
  PlaybackNotificationPayload,
  PlaybackNotificationType,
} from './playback-notifier';
export { RendererSlot, PREFERRED_FORWARD_BUFFER_SECONDS } from './slot/renderer-slot';
export type { ImageSource, RendererSlotOptions, RendererSlotEventMap } from './slot/renderer-slot';
export type {
  MediaLoadOptions,
  MediaRenderer,
  MediaRendererEventMap,
  MediaRendererEventType,
  MediaRendererFactory,
  MediaRendererStatus,
  SlotState,
} from './types';
