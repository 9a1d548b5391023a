import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ForecastCache } from '../forecast.cache.js';
import type { ForecastDataset } from '../forecast.types.js';

function dataset(product: string, rows = 2): ForecastDataset {
  return {
    columns: ['timestamp', 'product', 'point_forecast'],
    rows: Array.from({ length: rows }, (_, i) => ({
      timestamp: `2023-11-20T0${i}:00:00`,
      product,
      point_forecast: 20 + i,
    })),
  };
}

describe('ForecastCache', () => {
  let now: number;
  const clock = { now: () => now };
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
    now = 1_700_000_000_000;
  });

  function makeCache(config: { enabled?: boolean; maxEntries?: number; defaultTimeoutSeconds?: number } = {}) {
    return new ForecastCache({ clock, logger: mockLogger, ...config });
  }

  describe('get / set', () => {
    it('returns what was stored', () => {
      const cache = makeCache();
      const data = dataset('DALMP');

      expect(cache.set('k1', data)).toBe(true);
      expect(cache.get('k1')).toEqual(data);
      expect(mockLogger.info).toHaveBeenCalledWith({ key: 'k1', rows: 2 }, 'Cached forecast');
    });

    it('keeps its own copy of a stored dataset', () => {
      const cache = makeCache();
      const data = dataset('DALMP', 1);
      cache.set('k1', data);

      data.rows.length = 0;
      data.columns.push('extra');

      const cached = cache.get('k1');
      expect(cached?.rows).toEqual([{ timestamp: '2023-11-20T00:00:00', product: 'DALMP', point_forecast: 20 }]);
      expect(cached?.columns).toEqual(['timestamp', 'product', 'point_forecast']);
      expect(cache.getStats().totalRows).toBe(1);
    });

    it('hands out copies that do not touch the stored entry', () => {
      const cache = makeCache();
      cache.set('k1', dataset('DALMP', 2));

      const first = cache.get('k1');
      expect(first).not.toBeNull();
      first?.rows.pop();
      if (first?.rows[0]) first.rows[0].point_forecast = -1;

      const second = cache.get('k1');
      expect(second).not.toBe(first);
      expect(second?.rows).toHaveLength(2);
      expect(second?.rows[0].point_forecast).toBe(20);
    });

    it('returns null for an unknown key', () => {
      expect(makeCache().get('missing')).toBeNull();
    });

    it('refuses invalid datasets', () => {
      const cache = makeCache();

      expect(cache.set('k1', { columns: ['timestamp'], rows: [{ timestamp: 'x' }] })).toBe(false);
      expect(cache.set('k2', { columns: ['timestamp', 'product', 'point_forecast'], rows: [] })).toBe(false);
      expect(cache.size()).toBe(0);
      expect(mockLogger.error).toHaveBeenCalledTimes(2);
    });

    it('replaces an existing entry', () => {
      const cache = makeCache();
      cache.set('k1', dataset('DALMP', 1));
      cache.set('k1', dataset('DALMP', 3));

      expect(cache.size()).toBe(1);
      expect(cache.get('k1')?.rows).toHaveLength(3);
    });
  });

  describe('expiration', () => {
    it('keeps an entry until the default timeout is reached', () => {
      const cache = makeCache();
      cache.set('k1', dataset('DALMP'));

      now += 299_999;
      expect(cache.get('k1')).not.toBeNull();

      now += 1;
      expect(cache.get('k1')).toBeNull();
      expect(cache.size()).toBe(0);
    });

    it('honours a per-entry timeout', () => {
      const cache = makeCache();
      cache.set('short', dataset('DALMP'), 10);
      cache.set('long', dataset('DALMP'));

      now += 10_000;
      expect(cache.get('short')).toBeNull();
      expect(cache.get('long')).not.toBeNull();
    });

    it('drops an entry read after its timeout from the stats', () => {
      const cache = makeCache();
      cache.set('k1', dataset('DALMP'), 1);

      now += 2_000;
      expect(cache.get('k1')).toBeNull();
      expect(cache.getStats()).toMatchObject({ entryCount: 0, expiredCount: 0, missCount: 1 });
    });

    it('counts expired entries in stats without evicting them', () => {
      const cache = makeCache({ defaultTimeoutSeconds: 60 });
      cache.set('k1', dataset('DALMP'));

      now += 60_000;
      expect(cache.getStats().expiredCount).toBe(1);
      expect(cache.getStats().entryCount).toBe(1);
    });
  });

  describe('clear', () => {
    it('removes only the given product', () => {
      const cache = makeCache();
      cache.set('a', dataset('DALMP'));
      cache.set('b', dataset('DALMP'));
      cache.set('c', dataset('RTLMP'));
      cache.get('a');

      expect(cache.clear('DALMP')).toBe(2);
      expect(cache.size()).toBe(1);
      expect(cache.getStats().hitCount).toBe(1);
    });

    it('removes everything and resets counters without a product', () => {
      const cache = makeCache();
      cache.set('a', dataset('DALMP'));
      cache.get('a');
      cache.get('zzz');

      expect(cache.clear()).toBe(1);
      expect(cache.getStats()).toMatchObject({ entryCount: 0, hitCount: 0, missCount: 0 });
    });

    it('removes a single key via invalidate', () => {
      const cache = makeCache();
      cache.set('a', dataset('DALMP'));
      expect(cache.invalidate('a')).toBe(true);
      expect(cache.invalidate('a')).toBe(false);
    });
  });

  describe('getStats', () => {
    it('reports rows, products and hit rate', () => {
      const cache = makeCache();
      cache.set('a', dataset('DALMP', 2));
      cache.set('b', dataset('RegUp', 3));
      cache.get('a');
      cache.get('nope');

      expect(cache.getStats()).toEqual({
        entryCount: 2,
        totalRows: 5,
        expiredCount: 0,
        hitCount: 1,
        missCount: 1,
        hitRate: 50,
        products: { DALMP: 1, RegUp: 1 },
      });
    });

    it('has a zero hit rate before any lookups', () => {
      expect(makeCache().getStats().hitRate).toBe(0);
    });
  });

  describe('disabled', () => {
    it('neither stores nor counts', () => {
      const cache = makeCache({ enabled: false });

      expect(cache.set('a', dataset('DALMP'))).toBe(false);
      expect(cache.get('a')).toBeNull();
      expect(cache.getStats()).toMatchObject({ entryCount: 0, hitCount: 0, missCount: 0 });
    });
  });

  describe('maxEntries', () => {
    it('evicts the oldest entry when full', () => {
      const cache = makeCache({ maxEntries: 2 });
      cache.set('a', dataset('DALMP'));
      now += 1000;
      cache.set('b', dataset('DALMP'));
      now += 1000;
      cache.set('c', dataset('DALMP'));

      expect(cache.size()).toBe(2);
      expect(cache.get('a')).toBeNull();
      expect(cache.get('c')).not.toBeNull();
    });
  });
});
