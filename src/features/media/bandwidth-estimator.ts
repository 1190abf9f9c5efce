/**
 * Bandwidth Estimator
 *
 * Turns raw transfer measurements into a stream of throughput samples
 * (bits per second) for buffer sizing:
 * - The first positive measurement is published immediately
 * - Later measurements are averaged over an aggregation window
 * - Non-positive values and repeats of the last published value are dropped
 */

import { config } from '@/lib/config';
import { createLogger } from '@/lib/logger';

const logger = createLogger('BandwidthEstimator');

export type BandwidthListener = (bitsPerSecond: number) => void;

export interface BandwidthEstimatorConfig {
  /** Aggregation window after the first sample (default: `config.bandwidth.windowMs`) */
  windowMs?: number;
}

export class BandwidthEstimator {
  private readonly windowMs: number;
  private readonly listeners = new Set<BandwidthListener>();
  private pending: number[] = [];
  private windowTimer: ReturnType<typeof setTimeout> | null = null;
  private lastPublished: number | null = null;

  constructor(options: BandwidthEstimatorConfig = {}) {
    this.windowMs = options.windowMs ?? config.bandwidth.windowMs;
  }

  /** Last published throughput, or 0 before the first sample */
  get lastObservedBitrate(): number {
    return this.lastPublished ?? 0;
  }

  subscribe = (listener: BandwidthListener): (() => void) => {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  };

  /**
   * Record a throughput measurement in bits per second.
   */
  recordSample(bitsPerSecond: number): void {
    if (!Number.isFinite(bitsPerSecond) || bitsPerSecond <= 0) return;

    if (this.lastPublished === null) {
      this.publish(bitsPerSecond);
      return;
    }

    this.pending.push(bitsPerSecond);
    if (this.windowTimer === null) {
      this.windowTimer = setTimeout(() => this.flush(), this.windowMs);
    }
  }

  /**
   * Record a completed transfer of `bytes` that took `durationMs`.
   */
  recordTransfer(bytes: number, durationMs: number): void {
    if (durationMs <= 0 || bytes <= 0) return;
    this.recordSample((bytes * 8 * 1000) / durationMs);
  }

  dispose(): void {
    if (this.windowTimer !== null) {
      clearTimeout(this.windowTimer);
      this.windowTimer = null;
    }
    this.pending = [];
    this.listeners.clear();
  }

  private flush(): void {
    this.windowTimer = null;
    if (this.pending.length === 0) return;

    const total = this.pending.reduce((sum, sample) => sum + sample, 0);
    const average = Math.round(total / this.pending.length);
    this.pending = [];
    this.publish(average);
  }

  private publish(bitsPerSecond: number): void {
    if (bitsPerSecond === this.lastPublished) return;
    this.lastPublished = bitsPerSecond;
    logger.debug(`Throughput ${(bitsPerSecond / 1_000_000).toFixed(2)} Mbps`);

    for (const listener of this.listeners) {
      try {
        listener(bitsPerSecond);
      } catch (error) {
        logger.error('Error in bandwidth listener:', error);
      }
    }
  }
}
