import { describe, it, expect } from 'vitest';
import { LruCache } from '../../../src/utils/lru-cache.js';

describe('LruCache', () => {
  it('throws if maxSize < 1', () => {
    expect(() => new LruCache(0)).toThrow('LruCache maxSize must be >= 1');
  });

  it('stores, overwrites and retrieves values', () => {
    const cache = new LruCache<number>(10);
    cache.set('a', 1);
    cache.set('a', 2);

    expect(cache.get('a')).toBe(2);
    expect(cache.size).toBe(1);
    expect(cache.get('missing')).toBeUndefined();
  });

  it('matches keys exactly', () => {
    const cache = new LruCache<string>(10);
    cache.set('device-abc', 'x');

    expect(cache.get('DEVICE-ABC')).toBeUndefined();
    expect(cache.delete('Device-Abc')).toBe(false);
    expect(cache.delete('device-abc')).toBe(true);
    expect(cache.size).toBe(0);
  });

  it('evicts the least recently used entry', () => {
    const cache = new LruCache<number>(3);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);
    cache.get('a');
    cache.set('d', 4);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
    expect(cache.get('d')).toBe(4);
    expect(cache.size).toBe(3);
  });

  it('clears everything', () => {
    const cache = new LruCache<number>(3);
    cache.set('a', 1);
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.get('a')).toBeUndefined();
  });
});
