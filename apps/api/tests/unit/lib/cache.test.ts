import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createCacheKey } from '../../../src/core/branded-types.js';
import { ExtractionCache } from '../../../src/lib/cache.js';
import { articleText } from '../../helpers/fixtures.js';

describe('ExtractionCache', () => {
  let cache: ExtractionCache;
  const key = createCacheKey('https://example.com/story');

  beforeEach(() => {
    cache = new ExtractionCache({ maxSize: 2, ttlSeconds: 60 });
  });

  afterEach(() => {
    cache.clear();
  });

  it('returns_null_on_miss', () => {
    expect(cache.get(key)).toBeNull();
  });

  it('marks_hits_as_cached', () => {
    cache.set(key, articleText('Body text'));

    expect(cache.get(key)).toEqual({ ...articleText('Body text'), cached: true });
  });

  it('stores_a_copy_of_the_entry', () => {
    const entry = articleText('Body text');
    cache.set(key, entry);
    entry.text = 'mutated';

    expect(cache.get(key)?.text).toBe('Body text');
  });

  it('evicts_the_least_recently_used_entry', () => {
    const a = createCacheKey('https://example.com/a');
    const b = createCacheKey('https://example.com/b');
    const c = createCacheKey('https://example.com/c');
    cache.set(a, articleText('a'));
    cache.set(b, articleText('b'));
    cache.set(c, articleText('c'));

    expect(cache.has(a)).toBe(false);
    expect(cache.has(c)).toBe(true);
    expect(cache.getStats()).toEqual({ size: 2, maxSize: 2, ttlMs: 60000 });
  });

  it('clear_empties_the_cache', () => {
    cache.set(key, articleText('Body text'));
    cache.clear();

    expect(cache.getStats().size).toBe(0);
  });
});
