import { describe, expect, it, vi } from 'vitest';

import { TtlCache } from '../src/ttl-cache';

function createClock(start = 1_700_000_000_000) {
  let current = start;
  return {
    now: () => current,
    advanceSeconds(seconds: number) {
      current += seconds * 1000;
    },
  };
}

describe('TtlCache', () => {
  it('returns a stored payload until the ttl elapses', () => {
    const clock = createClock();
    const cache = new TtlCache<{ content: string }>({ ttlSeconds: 60, now: clock.now });
    const payload = { content: 'cached' };

    cache.put('religion:buddhism::', payload);
    expect(cache.get('religion:buddhism::')).toBe(payload);

    clock.advanceSeconds(59);
    expect(cache.get('religion:buddhism::')).toBe(payload);

    clock.advanceSeconds(1);
    expect(cache.get('religion:buddhism::')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('defaults to a 24 hour ttl', () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ now: clock.now });

    cache.put('key', 'value');
    clock.advanceSeconds(24 * 60 * 60 - 1);
    expect(cache.get('key')).toBe('value');

    clock.advanceSeconds(1);
    expect(cache.get('key')).toBeUndefined();
  });

  it('replaces entries wholesale and restarts their clock', () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ ttlSeconds: 10, now: clock.now });

    cache.put('key', 'first');
    clock.advanceSeconds(8);
    cache.put('key', 'second');
    clock.advanceSeconds(8);

    expect(cache.get('key')).toBe('second');
  });

  it('evicts the least recently used entry beyond capacity', () => {
    const cache = new TtlCache<number>({ maxEntries: 2 });

    cache.put('a', 1);
    cache.put('b', 2);
    expect(cache.get('a')).toBe(1);
    cache.put('c', 3);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
    expect(cache.size).toBe(2);
  });

  it('rejects invalid options', () => {
    expect(() => new TtlCache({ ttlSeconds: 0 })).toThrow(/ttlSeconds/);
    expect(() => new TtlCache({ maxEntries: 1.5 })).toThrow(/maxEntries/);
  });

  describe('getOrCompute', () => {
    it('computes once on a miss and serves hits afterwards', async () => {
      const cache = new TtlCache<string>();
      const compute = vi.fn().mockResolvedValue('generated');

      await expect(cache.getOrCompute('key', compute)).resolves.toEqual({
        value: 'generated',
        hit: false,
      });
      await expect(cache.getOrCompute('key', compute)).resolves.toEqual({
        value: 'generated',
        hit: true,
      });
      expect(compute).toHaveBeenCalledTimes(1);
    });

    it('shares one computation between concurrent misses for a key', async () => {
      const cache = new TtlCache<string>();
      let resolveCompute: (value: string) => void = () => undefined;
      const compute = vi.fn(
        () =>
          new Promise<string>((resolve) => {
            resolveCompute = resolve;
          }),
      );

      const first = cache.getOrCompute('key', compute);
      const second = cache.getOrCompute('key', compute);
      resolveCompute('shared');

      await expect(first).resolves.toEqual({ value: 'shared', hit: false });
      await expect(second).resolves.toEqual({ value: 'shared', hit: false });
      expect(compute).toHaveBeenCalledTimes(1);
      expect(cache.get('key')).toBe('shared');
    });

    it('does not cache failures', async () => {
      const cache = new TtlCache<string>();
      const compute = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('upstream down'))
        .mockResolvedValueOnce('recovered');

      await expect(cache.getOrCompute('key', compute)).rejects.toThrow('upstream down');
      expect(cache.get('key')).toBeUndefined();

      await expect(cache.getOrCompute('key', compute)).resolves.toEqual({
        value: 'recovered',
        hit: false,
      });
      expect(compute).toHaveBeenCalledTimes(2);
    });

    it('recomputes once the cached value expires', async () => {
      const clock = createClock();
      const cache = new TtlCache<string>({ ttlSeconds: 5, now: clock.now });
      const compute = vi
        .fn<() => Promise<string>>()
        .mockResolvedValueOnce('old')
        .mockResolvedValueOnce('new');

      await cache.getOrCompute('key', compute);
      clock.advanceSeconds(5);

      await expect(cache.getOrCompute('key', compute)).resolves.toEqual({
        value: 'new',
        hit: false,
      });
    });
  });
});
