/**
 * Image Cache
 *
 * Bounded LRU cache in front of an injected image loader. Holds decoded
 * images keyed by URL so slots that rebind to a recently shown image do not
 * fetch it again.
 *
 * - Fixed entry capacity, least recently used entry evicted first
 * - Concurrent fetches of the same URL share one load
 * - Failures are returned, never cached
 */

import { config } from '@/lib/config';
import { createLogger } from '@/lib/logger';
import { PlaylistLoadError, toError } from '@/lib/errors';

const logger = createLogger('ImageCache');

export type ImageLoader<TImage> = (url: string) => Promise<TImage>;

export type ImageFetchResult<TImage> =
  | { ok: true; image: TImage }
  | { ok: false; error: PlaylistLoadError };

/**
 * Image cache configuration
 */
export interface ImageCacheConfig<TImage> {
  /** Fetches and decodes one image */
  loader: ImageLoader<TImage>;
  /** Maximum number of cached images (default: `config.imageCache.capacity`) */
  capacity?: number;
  /** Callback when an image is evicted */
  onEvict?: (url: string, image: TImage) => void;
}

export interface ImageCacheStats {
  entries: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

export class ImageCache<TImage> {
  private readonly loader: ImageLoader<TImage>;
  private readonly capacity: number;
  private readonly onEvict: (url: string, image: TImage) => void;
  // Map iteration order doubles as recency order: oldest first
  private readonly entries = new Map<string, TImage>();
  private readonly inFlight = new Map<string, Promise<ImageFetchResult<TImage>>>();

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ImageCacheConfig<TImage>) {
    this.loader = options.loader;
    this.capacity = Math.max(1, Math.floor(options.capacity ?? config.imageCache.capacity));
    this.onEvict = options.onEvict ?? (() => {});
  }

  /**
   * Return the cached image for a URL, loading it on a miss.
   */
  fetch(url: string): Promise<ImageFetchResult<TImage>> {
    const cached = this.get(url);
    if (cached !== undefined) {
      return Promise.resolve({ ok: true, image: cached });
    }

    const pending = this.inFlight.get(url);
    if (pending) return pending;

    const load = this.load(url).finally(() => {
      this.inFlight.delete(url);
    });
    this.inFlight.set(url, load);
    return load;
  }

  /**
   * Get an image without loading. Counts as a use for eviction order.
   */
  get(url: string): TImage | undefined {
    const image = this.entries.get(url);
    if (image === undefined) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    this.entries.delete(url);
    this.entries.set(url, image);
    return image;
  }

  /**
   * Store an image, replacing any previous entry for the URL.
   */
  set(url: string, image: TImage): void {
    if (this.entries.has(url)) {
      this.entries.delete(url);
    }
    this.entries.set(url, image);

    while (this.entries.size > this.capacity) {
      this.evictOldest();
    }
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  delete(url: string): boolean {
    return this.entries.delete(url);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /** URLs from least to most recently used */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  getStats(): ImageCacheStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  private async load(url: string): Promise<ImageFetchResult<TImage>> {
    try {
      const image = await this.loader(url);
      this.set(url, image);
      return { ok: true, image };
    } catch (error) {
      const cause = toError(error);
      logger.warn(`Failed to load image ${url}:`, cause.message);
      return {
        ok: false,
        error: new PlaylistLoadError(`Failed to load image: ${cause.message}`, 'image', url, { cause }),
      };
    }
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;

    const url = oldest.value;
    const image = this.entries.get(url);
    this.entries.delete(url);
    this.evictions++;
    if (image !== undefined) {
      this.onEvict(url, image);
    }
    logger.debug(`Evicted ${url}`);
  }
}
