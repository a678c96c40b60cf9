import { CatalogCache } from '../../../src/catalog/catalog-cache';

describe('CatalogCache', () => {
  let now: number;
  let cache: CatalogCache<string>;

  beforeEach(() => {
    now = 1_000;
    cache = new CatalogCache<string>(() => 500, () => now);
  });

  it('should load once while the entry is fresh', async () => {
    const load = jest.fn().mockResolvedValue('tarifa');

    await cache.getOrLoad('k', load);
    now += 499;
    const value = await cache.getOrLoad('k', load);

    expect(value).toBe('tarifa');
    expect(load).toHaveBeenCalledTimes(1);
  });

  it('should reload expired entries', async () => {
    const load = jest.fn().mockResolvedValueOnce('vieja').mockResolvedValueOnce('nueva');

    await cache.getOrLoad('k', load);
    now += 500;

    expect(await cache.getOrLoad('k', load)).toBe('nueva');
  });

  it('should drop every entry when a load fails', async () => {
    await cache.getOrLoad('a', async () => 'A');
    await cache.getOrLoad('b', async () => 'B');
    expect(cache.size).toBe(2);

    await expect(cache.getOrLoad('c', () => Promise.reject(new Error('timeout')))).rejects.toThrow('timeout');
    expect(cache.size).toBe(0);
  });

  it('should not keep misses', async () => {
    await cache.getOrLoad('missing', async () => undefined);

    expect(cache.size).toBe(0);
  });
});
