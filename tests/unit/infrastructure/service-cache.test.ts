/**
 * @fileoverview Unit tests for ServiceCache
 */

import { ServiceCache } from '../../../src';

describe('ServiceCache', () => {
  it('should count hits per entry and overall', () => {
    const cache = new ServiceCache<string>();
    cache.set('clock', { id: 1 });

    cache.get('clock');
    cache.get('clock');
    cache.get('missing');

    expect(cache.get('clock')?.hitCount).toBe(3);
    expect(cache.stats()).toEqual({
      hits: 3,
      misses: 1,
      size: 1,
      capacity: 1000,
      hitRate: 0.75,
    });
  });

  it('should evict the least recently used entry at capacity', () => {
    const cache = new ServiceCache<string>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');

    cache.set('c', 3);

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
  });

  it('should reset the hit count when an entry is replaced', () => {
    const cache = new ServiceCache<string>();
    cache.set('a', 1);
    cache.get('a');

    cache.set('a', 2);

    expect(cache.snapshot()).toEqual([
      expect.objectContaining({ key: 'a', instance: 2, hitCount: 0 }),
    ]);
  });

  it('should invalidate single entries and clear everything', () => {
    const cache = new ServiceCache<string>();
    cache.set('a', 1);
    cache.set('b', 2);

    expect(cache.invalidate('a')).toBe(true);
    expect(cache.invalidate('a')).toBe(false);
    expect(cache.size).toBe(1);

    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.stats().hits).toBe(0);
  });
});
