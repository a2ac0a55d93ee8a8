interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export interface QueryCacheOptions {
  ttlMs: number;
  now?: () => number;
}

/**
 * Time-expiring memo of query results, keyed by the query parameters.
 * Each instance is owned by the repository it is handed to; nothing is shared
 * process-wide. Rejected loads are not stored, so the next call retries.
 */
export class QueryCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly pending = new Map<string, Promise<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: QueryCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    this.sweepExpired();
    return this.store.size;
  }

  get(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T) {
    this.sweepExpired();
    this.store.set(key, { value, storedAt: this.now() });
  }

  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const request = load()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, request);
    return request;
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() - entry.storedAt >= this.ttlMs;
  }

  private sweepExpired() {
    for (const [key, entry] of this.store.entries()) {
      if (this.isExpired(entry)) {
        this.store.delete(key);
      }
    }
  }
}
