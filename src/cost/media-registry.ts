import type { MediaCharacteristics } from '../models/types.js';
import { getLogger } from '../core/logger.js';
import { LruCache } from '../utils/lru-cache.js';
import { withCostEstimate } from './estimator.js';

const DEFAULT_CACHE_SIZE = 2_000;

/**
 * Caches normalized media records per media source so the cost estimate is
 * computed once per source.
 */
export class MediaRegistry {
  private logger = getLogger();
  private cache: LruCache<MediaCharacteristics>;

  constructor(maxEntries: number = DEFAULT_CACHE_SIZE) {
    this.cache = new LruCache(maxEntries);
  }

  /**
   * Normalize the record and attach a cost estimate. Records without a
   * media source id are never cached.
   */
  resolve(media: Readonly<MediaCharacteristics>): MediaCharacteristics {
    const sourceId = media.mediaSourceId;
    if (sourceId) {
      const cached = this.cache.get(sourceId);
      if (cached) return cached;
    }

    const resolved = withCostEstimate(media);

    if (sourceId) {
      this.cache.set(sourceId, resolved);
    }

    this.logger.debug(
      {
        mediaSourceId: sourceId,
        videoCodec: resolved.videoCodec,
        audioCodec: resolved.audioCodec,
        container: resolved.container,
        width: resolved.width,
        height: resolved.height,
        cost: resolved.transcodeCostEstimate,
      },
      'Resolved media',
    );

    return resolved;
  }

  get(mediaSourceId: string): MediaCharacteristics | undefined {
    return this.cache.get(mediaSourceId);
  }

  invalidate(mediaSourceId: string): boolean {
    return this.cache.delete(mediaSourceId);
  }

  invalidateAll(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
