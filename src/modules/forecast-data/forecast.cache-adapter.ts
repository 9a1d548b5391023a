/**
 * FORECAST DATA: Caching adapter
 *
 * Wraps a dataset-returning async function with cache-or-fetch behaviour.
 * The cache key comes from an explicit `keyOf` over the call arguments;
 * nothing is guessed from argument positions.
 *
 * Each call also takes a `prepare` step that runs on cached and fetched data
 * alike. On a miss the raw dataset is stored only after `prepare` succeeded.
 */

import type { ForecastCache } from './forecast.cache.js';
import type { ForecastDataset } from './forecast.types.js';

export interface CachedCallResult<R> {
  value: R;
  raw: ForecastDataset;
  fromCache: boolean;
  key: string;
}

export interface CacheCallOptions {
  timeoutSeconds?: number | null;
}

export type CachedCall<A extends unknown[]> = <R>(
  args: A,
  prepare: (dataset: ForecastDataset) => R
) => Promise<CachedCallResult<R>>;

export function cacheForecastCall<A extends unknown[]>(
  cache: ForecastCache,
  keyOf: (...args: A) => string,
  fetch: (...args: A) => Promise<ForecastDataset>,
  options: CacheCallOptions = {}
): CachedCall<A> {
  return async <R>(args: A, prepare: (dataset: ForecastDataset) => R): Promise<CachedCallResult<R>> => {
    const key = keyOf(...args);

    const cached = cache.get(key);
    if (cached) {
      return { value: prepare(cached), raw: cached, fromCache: true, key };
    }

    const raw = await fetch(...args);
    const value = prepare(raw);
    // a refused dataset (invalid or cache disabled) is still handed back
    cache.set(key, raw, options.timeoutSeconds);
    return { value, raw, fromCache: false, key };
  };
}
