import { describe, it, expect } from 'vitest';
import { MemoryBuildCache, buildCacheKey } from '../../src/cache';
import { BuildError } from '../../src/errors';

describe('buildCacheKey', () => {
  it('should prefix the hash with the unit name', () => {
    expect(buildCacheKey('helper', {})).toMatch(/^helper:[0-9a-f]{64}$/);
  });

  it('should ignore key order in the variables', () => {
    expect(buildCacheKey('helper', { a: 1, b: { c: 2, d: 3 } })).toBe(
      buildCacheKey('helper', { b: { d: 3, c: 2 }, a: 1 })
    );
  });

  it('should distinguish different variables', () => {
    expect(buildCacheKey('helper', { a: 1 })).not.toBe(buildCacheKey('helper', { a: 2 }));
  });

  it('should distinguish nested values that a shallow hash would miss', () => {
    expect(buildCacheKey('helper', { list: [1, 2] })).not.toBe(buildCacheKey('helper', { list: [2, 1] }));
  });

  it('should include the composition', () => {
    expect(buildCacheKey('helper', {}, { model: 'fast' })).not.toBe(buildCacheKey('helper', {}));
    expect(buildCacheKey('helper', {}, { children: ['a'] })).not.toBe(buildCacheKey('helper', {}, { children: ['b'] }));
  });

  it('should treat undefined composition fields as absent', () => {
    expect(buildCacheKey('helper', {}, { model: undefined })).toBe(buildCacheKey('helper', {}));
  });

  it('should reject variables that cannot be serialized', () => {
    const attempt = () => buildCacheKey('helper', { count: BigInt(3) });

    expect(attempt).toThrow(BuildError);
    expect(attempt).toThrow(/^Cannot build cache key for 'helper': /);
  });
});

describe('MemoryBuildCache', () => {
  it('should store, count and clear entries', () => {
    const cache = new MemoryBuildCache<string>();
    cache.set('a', 'first');
    cache.set('b', 'second');

    expect(cache.get('a')).toBe('first');
    expect(cache.size).toBe(2);

    cache.clear();
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });
});
