/**
 * FORECAST CACHE
 * ==============
 *
 * In-memory, time-expiring, product-partitioned store of raw forecast
 * datasets keyed by `generateForecastCacheKey`.
 *
 * - Lazy expiry: an entry is live while `now - createdAt < timeout`; expired
 *   entries stay in the map (and show up as `expiredCount`) until a get()
 *   or clear() touches them. There is no background sweep.
 * - Only datasets that pass validation are stored.
 * - Entries hold a private copy; set() copies in and get() copies out.
 * - Optional `maxEntries` bound: when full, expired entries go first, then
 *   the oldest one.
 *
 * Every mutation is a single Map operation inside one event-loop turn, so
 * concurrent callers never observe a half-written entry (last write wins).
 */

import type { Clock, Logger } from '../../common/logger.js';
import { createConsoleLogger, defaultClock } from '../../common/logger.js';
import type { CacheEntry, CacheStatistics, ForecastDataset } from './forecast.types.js';
import { validateForecastDataset } from './forecast.validator.js';

export interface ForecastCacheConfig {
  enabled?: boolean;
  defaultTimeoutSeconds?: number;
  maxEntries?: number;
  clock?: Clock;
  logger?: Logger;
}

const UNKNOWN_PRODUCT = 'unknown';

export class ForecastCache {
  private map = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  readonly enabled: boolean;
  readonly defaultTimeoutSeconds: number;
  private readonly maxEntries: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: ForecastCacheConfig = {}) {
    this.enabled = config.enabled ?? true;
    this.defaultTimeoutSeconds = config.defaultTimeoutSeconds ?? 300;
    this.maxEntries = config.maxEntries ?? Number.POSITIVE_INFINITY;
    this.clock = config.clock ?? defaultClock;
    this.logger = config.logger ?? createConsoleLogger('ForecastCache');
  }

  /**
   * Live dataset for `key`, or null when disabled, absent or expired.
   * An expired entry is evicted by this call.
   */
  get(key: string): ForecastDataset | null {
    if (!this.enabled) {
      this.logger.debug?.({ key }, 'Caching is disabled, not retrieving from cache');
      return null;
    }

    const entry = this.map.get(key);
    if (!entry) {
      this.misses++;
      this.logger.debug?.({ key }, 'Cache miss');
      return null;
    }

    if (!this.isLive(entry)) {
      this.map.delete(key);
      this.misses++;
      this.logger.debug?.({ key }, 'Cache expired');
      return null;
    }

    this.hits++;
    this.logger.debug?.({ key }, 'Cache hit');
    return copyDataset(entry.dataset);
  }

  /**
   * Store a dataset. Returns false when caching is disabled or the dataset
   * fails validation.
   */
  set(key: string, dataset: ForecastDataset, timeoutSeconds?: number | null): boolean {
    if (!this.enabled) {
      this.logger.debug?.({ key }, 'Caching is disabled, not storing forecast');
      return false;
    }

    const { isValid, errors } = validateForecastDataset(dataset);
    if (!isValid) {
      this.logger.error({ key, errors }, 'Invalid forecast dataset, not cached');
      return false;
    }

    if (!this.map.has(key) && this.map.size >= this.maxEntries) {
      this.makeRoom();
    }

    const firstProduct = dataset.rows[0]?.product;
    this.map.set(key, {
      key,
      dataset: copyDataset(dataset),
      createdAt: this.clock.now(),
      timeoutSeconds: timeoutSeconds ?? null,
      product: firstProduct === null || firstProduct === undefined ? UNKNOWN_PRODUCT : String(firstProduct),
      rowCount: dataset.rows.length,
    });

    this.logger.info({ key, rows: dataset.rows.length }, 'Cached forecast');
    return true;
  }

  /**
   * Remove one entry; true if it existed
   */
  invalidate(key: string): boolean {
    return this.map.delete(key);
  }

  /**
   * No product: drop everything and reset hit/miss counters.
   * With product: drop only that product's entries; counters untouched.
   */
  clear(product?: string | null): number {
    if (product === undefined || product === null) {
      const count = this.map.size;
      this.map.clear();
      this.hits = 0;
      this.misses = 0;
      this.logger.info({ count }, 'Cleared all forecast cache entries');
      return count;
    }

    let count = 0;
    for (const [key, entry] of this.map.entries()) {
      if (entry.product === product) {
        this.map.delete(key);
        count++;
      }
    }
    this.logger.info({ product, count }, 'Cleared forecast cache for product');
    return count;
  }

  /**
   * Live statistics. Read-only: expired entries are counted, not evicted.
   */
  getStats(): CacheStatistics {
    let totalRows = 0;
    let expiredCount = 0;
    const products: Record<string, number> = {};

    for (const entry of this.map.values()) {
      totalRows += entry.rowCount;
      if (!this.isLive(entry)) expiredCount++;
      products[entry.product] = (products[entry.product] ?? 0) + 1;
    }

    const total = this.hits + this.misses;
    return {
      entryCount: this.map.size,
      totalRows,
      expiredCount,
      hitCount: this.hits,
      missCount: this.misses,
      hitRate: total > 0 ? (this.hits / total) * 100 : 0,
      products,
    };
  }

  size(): number {
    return this.map.size;
  }

  private isLive(entry: CacheEntry): boolean {
    const ageSeconds = (this.clock.now() - entry.createdAt) / 1000;
    const timeout = entry.timeoutSeconds ?? this.defaultTimeoutSeconds;
    return ageSeconds < timeout;
  }

  private makeRoom(): void {
    for (const [key, entry] of this.map.entries()) {
      if (!this.isLive(entry)) this.map.delete(key);
    }
    if (this.map.size < this.maxEntries) return;

    // insertion order == creation order, except for overwrites which keep their slot
    let oldest: CacheEntry | null = null;
    for (const entry of this.map.values()) {
      if (!oldest || entry.createdAt < oldest.createdAt) oldest = entry;
    }
    if (oldest) {
      this.map.delete(oldest.key);
      this.logger.debug?.({ key: oldest.key }, 'Evicted oldest cache entry');
    }
  }
}

function copyDataset(dataset: ForecastDataset): ForecastDataset {
  return {
    columns: [...dataset.columns],
    rows: dataset.rows.map(row => ({ ...row })),
  };
}
