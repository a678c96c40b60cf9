interface CacheEntry<T> {
  value: T;
  timestamp: number;
}

/**
 * Read-through cache for catalog rows. Entries expire after the TTL and the
 * whole cache is dropped whenever a lookup fails.
 */
export class CatalogCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: () => number,
    private readonly now: () => number = Date.now,
  ) {}

  async getOrLoad(key: string, load: () => Promise<T | undefined>): Promise<T | undefined> {
    const cached = this.entries.get(key);
    if (cached && this.isValid(cached)) {
      return cached.value;
    }

    let value: T | undefined;
    try {
      value = await load();
    } catch (error: unknown) {
      this.entries.clear();
      throw error;
    }

    if (value === undefined) {
      this.entries.delete(key);
    } else {
      this.entries.set(key, { value, timestamp: this.now() });
    }
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private isValid(entry: CacheEntry<T>): boolean {
    return this.now() - entry.timestamp < this.ttlMs();
  }
}
