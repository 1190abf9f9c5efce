/**
 * Analytics side-channel for video lifecycle events.
 *
 * Observers only: nothing in the playlist reacts to these events. A single
 * notifier is normally shared by every playlist in the host application.
 */

import { EventEmitter } from '@/lib/event-emitter';

export interface PlaybackNotificationPayload {
  timestamp: Date;
  url: string;
  error?: Error;
}

export type PlaybackNotificationMap = {
  /** A video was asked to start playing */
  videoRequested: PlaybackNotificationPayload;
  /** The renderer began rendering frames */
  videoStarted: PlaybackNotificationPayload;
  /** Playback is waiting for data */
  videoStalled: PlaybackNotificationPayload;
  /** The renderer failed to open or play the media */
  videoError: PlaybackNotificationPayload;
};

export type PlaybackNotificationType = keyof PlaybackNotificationMap;

export class PlaybackNotifier extends EventEmitter<PlaybackNotificationMap> {
  private readonly now: () => Date;

  constructor(options?: { now?: () => Date }) {
    super();
    this.now = options?.now ?? (() => new Date());
  }

  dispatchVideoRequested(url: string): void {
    this.dispatchEvent('videoRequested', this.payload(url));
  }

  dispatchVideoStarted(url: string): void {
    this.dispatchEvent('videoStarted', this.payload(url));
  }

  dispatchVideoStalled(url: string): void {
    this.dispatchEvent('videoStalled', this.payload(url));
  }

  dispatchVideoError(url: string, error?: Error): void {
    this.dispatchEvent('videoError', this.payload(url, error));
  }

  private payload(url: string, error?: Error): PlaybackNotificationPayload {
    return error ? { timestamp: this.now(), url, error } : { timestamp: this.now(), url };
  }
}
