import { createLogger } from './logger';

const logger = createLogger('EventEmitter');

export type CallbackListener<TDetail> = (data: { detail: TDetail }) => void;

/**
 * Listener registry keyed by event name.
 *
 * Subclasses expose typed `dispatchX()` helpers and call `dispatchEvent`;
 * a throwing listener is logged and does not stop the others.
 */
export class EventEmitter<TEventMap extends Record<string, unknown>> {
  private listeners: { [K in keyof TEventMap]?: Array<CallbackListener<TEventMap[K]>> } = {};

  addEventListener<Q extends keyof TEventMap>(
    name: Q,
    callback: CallbackListener<TEventMap[Q]>
  ): () => void {
    const existing = this.listeners[name] ?? [];
    this.listeners[name] = [...existing, callback];
    return () => this.removeEventListener(name, callback);
  }

  removeEventListener<Q extends keyof TEventMap>(
    name: Q,
    callback: CallbackListener<TEventMap[Q]>
  ): void {
    const existing = this.listeners[name];
    if (!existing) return;
    this.listeners[name] = existing.filter((l) => l !== callback);
  }

  once<Q extends keyof TEventMap>(name: Q, callback: CallbackListener<TEventMap[Q]>): () => void {
    const wrapper: CallbackListener<TEventMap[Q]> = (data) => {
      this.removeEventListener(name, wrapper);
      callback(data);
    };
    return this.addEventListener(name, wrapper);
  }

  hasListeners(name: keyof TEventMap): boolean {
    return this.listenerCount(name) > 0;
  }

  listenerCount(name: keyof TEventMap): number {
    return this.listeners[name]?.length ?? 0;
  }

  removeAllListeners(): void {
    this.listeners = {};
  }

  protected dispatchEvent<T extends keyof TEventMap>(eventName: T, payload: TEventMap[T]): void {
    // Snapshot so listeners may unsubscribe while being called
    const callbacks = this.listeners[eventName] ?? [];
    for (const callback of callbacks) {
      try {
        callback({ detail: payload });
      } catch (error) {
        logger.error(`Error in event listener for ${String(eventName)}:`, error);
      }
    }
  }
}
