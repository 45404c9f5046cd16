import { describe, it, expect } from 'vitest';
import { TtlCache } from './ttl-cache.js';

describe('TtlCache', () => {
  it('should expire entries once the TTL has passed', () => {
    let now = 0;
    const cache = new TtlCache<number>(1000, () => now);
    cache.set('a', 1);

    now = 999;
    expect(cache.get('a')).toBe(1);

    now = 1000;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should distinguish a cached null from a miss', () => {
    const cache = new TtlCache<string | null>(1000, () => 0);
    cache.set('miss', null);
    expect(cache.get('miss')).toBeNull();
    expect(cache.get('other')).toBeUndefined();
  });

  it('should evict the oldest entry once full', () => {
    const cache = new TtlCache<number>(1000, () => 0, 2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);

    expect(cache.size).toBe(2);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBe(2);
    expect(cache.get('c')).toBe(3);
  });

  it('should prune expired entries before evicting live ones', () => {
    let now = 0;
    const cache = new TtlCache<number>(1000, () => now, 2);
    cache.set('old', 1);
    now = 500;
    cache.set('live', 2);
    now = 1200;
    cache.set('new', 3);

    expect(cache.size).toBe(2);
    expect(cache.get('live')).toBe(2);
    expect(cache.get('new')).toBe(3);
  });

  it('should refresh a key without evicting others', () => {
    const cache = new TtlCache<number>(1000, () => 0, 2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);

    expect(cache.size).toBe(2);
    expect(cache.get('a')).toBe(10);
    expect(cache.get('b')).toBe(2);
  });
});
