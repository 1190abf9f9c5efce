import { describe, expect, it, vi } from 'vitest';
import { PlaybackNotifier } from './playback-notifier';

const VIDEO_URL = 'https://cdn.test/story.mp4';

describe('PlaybackNotifier', () => {
  it('should stamp lifecycle events with the current time', () => {
    const notifier = new PlaybackNotifier({ now: () => new Date(1_000) });
    const started = vi.fn();
    notifier.addEventListener('videoStarted', started);

    notifier.dispatchVideoStarted(VIDEO_URL);

    expect(started).toHaveBeenCalledWith({ detail: { timestamp: new Date(1_000), url: VIDEO_URL } });
  });

  it('should route each event to its own listeners', () => {
    const notifier = new PlaybackNotifier();
    const requested = vi.fn();
    const stalled = vi.fn();
    notifier.addEventListener('videoRequested', requested);
    notifier.addEventListener('videoStalled', stalled);

    notifier.dispatchVideoStalled(VIDEO_URL);

    expect(requested).not.toHaveBeenCalled();
    expect(stalled).toHaveBeenCalledTimes(1);
  });

  it('should attach the error to failure events', () => {
    const notifier = new PlaybackNotifier({ now: () => new Date(0) });
    const failed = vi.fn();
    notifier.addEventListener('videoError', failed);
    const error = new Error('unsupported codec');

    notifier.dispatchVideoError(VIDEO_URL, error);

    expect(failed).toHaveBeenCalledWith({ detail: { timestamp: new Date(0), url: VIDEO_URL, error } });
  });
});
