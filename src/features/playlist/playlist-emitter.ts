import { EventEmitter } from '@/lib/event-emitter';
import type { PlaylistItem } from '@/types/playlist';

type ItemReachedEndPayload = { index: number; item: PlaylistItem };
type ProgressRequestPayload = { seconds: number };

export type PlaylistEventMap = {
  /** The last item finished and there is nothing to advance to */
  reachedEnd: undefined;
  /** Any current item finished (after loop/repeat behaviors) */
  itemReachedEnd: ItemReachedEndPayload;
  /** A caller asked to move the playhead of the current item */
  progressrequest: ProgressRequestPayload;
};

export type PlaylistEventType = keyof PlaylistEventMap;

export class PlaylistEmitter extends EventEmitter<PlaylistEventMap> {
  dispatchReachedEnd(): void {
    this.dispatchEvent('reachedEnd', undefined);
  }

  dispatchItemReachedEnd(index: number, item: PlaylistItem): void {
    this.dispatchEvent('itemReachedEnd', { index, item });
  }

  dispatchProgressRequest(seconds: number): void {
    this.dispatchEvent('progressrequest', { seconds });
  }
}
