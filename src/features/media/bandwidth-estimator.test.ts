import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BandwidthEstimator } from './bandwidth-estimator';

describe('Bandwidth Estimator', () => {
  let estimator: BandwidthEstimator;
  let listener: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.useFakeTimers();
    estimator = new BandwidthEstimator({ windowMs: 10_000 });
    listener = vi.fn();
    estimator.subscribe(listener);
  });

  afterEach(() => {
    estimator.dispose();
    vi.useRealTimers();
  });

  it('should publish the first positive sample immediately', () => {
    estimator.recordSample(2_000_000);

    expect(listener).toHaveBeenCalledWith(2_000_000);
    expect(estimator.lastObservedBitrate).toBe(2_000_000);
  });

  it('should ignore non-positive and non-finite samples', () => {
    estimator.recordSample(0);
    estimator.recordSample(-5);
    estimator.recordSample(Number.NaN);

    expect(listener).not.toHaveBeenCalled();
    expect(estimator.lastObservedBitrate).toBe(0);
  });

  it('should average later samples over the window', () => {
    estimator.recordSample(2_000_000);
    estimator.recordSample(3_000_000);
    estimator.recordSample(4_000_000);

    vi.advanceTimersByTime(9_999);
    expect(listener).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(1);
    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenLastCalledWith(3_500_000);
  });

  it('should drop a window average equal to the last value', () => {
    estimator.recordSample(2_000_000);
    estimator.recordSample(1_000_000);
    estimator.recordSample(3_000_000);

    vi.advanceTimersByTime(10_000);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should convert transfers to bits per second', () => {
    estimator.recordTransfer(250_000, 1_000);

    expect(listener).toHaveBeenCalledWith(2_000_000);
  });

  it('should stop notifying after unsubscribe', () => {
    const other = vi.fn();
    const unsubscribe = estimator.subscribe(other);
    unsubscribe();

    estimator.recordSample(1_000_000);

    expect(other).not.toHaveBeenCalled();
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should take its default window from the environment', async () => {
    vi.stubEnv('PLAYLIST_BANDWIDTH_WINDOW_MS', '2000');
    vi.resetModules();
    const { BandwidthEstimator: ConfiguredEstimator } = await import('./bandwidth-estimator');
    const configured = new ConfiguredEstimator();
    const published = vi.fn();
    configured.subscribe(published);

    configured.recordSample(1_000_000);
    configured.recordSample(3_000_000);
    vi.advanceTimersByTime(2_000);

    expect(published).toHaveBeenLastCalledWith(3_000_000);
    configured.dispose();
  });

  it('should keep notifying after a throwing listener', () => {
    estimator.subscribe(() => {
      throw new Error('listener failed');
    });
    const after = vi.fn();
    estimator.subscribe(after);

    estimator.recordSample(1_000_000);

    expect(after).toHaveBeenCalledWith(1_000_000);
  });
});
