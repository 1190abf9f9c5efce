// Playlist feature: public API
// Item model, navigation store and the controller facade

export { PlaylistController } from './playlist-controller';
export type { PlaylistControllerOptions, SubscribeOptions } from './playlist-controller';
export { PlaylistEmitter } from './playlist-emitter';
export type { PlaylistEventMap, PlaylistEventType } from './playlist-emitter';
export {
  createPlaylistStore,
  selectCurrentItem,
  selectIsLastItem,
  selectRangedItems,
} from './stores/playlist-store';
export type { PlaylistStore } from './stores/playlist-store';
export type { PlaylistActions, PlaylistState, PlaylistStoreInit, PlaylistStoreState } from './types';
export {
  customItem,
  DEFAULT_IMAGE_DURATION_SECONDS,
  errorItem,
  getFixedDuration,
  getItemUrl,
  imageItem,
  isSameItem,
  itemKey,
  parsePlaylistItems,
  playlistItemInputSchema,
  videoItem,
} from './utils/playlist-item';
export type { PlaylistItemInput } from './utils/playlist-item';
export {
  BACKWARD_BUFFER_RANGE,
  bufferSizesForBitrate,
  FORWARD_BUFFER_RANGE,
  getWindowItems,
  getWindowSize,
} from './utils/buffer-window';
export type { BufferSizes } from './utils/buffer-window';
