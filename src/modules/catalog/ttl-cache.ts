import { SingleFlight } from '../../common/utils/single-flight';

export interface CacheEntry<T> {
  readonly value: T;
  readonly fetchedAt: number;
  readonly ttl: number;
}

export type Clock = () => number;

/**
 * Read-through cache with a fixed TTL in milliseconds. A miss runs the loader
 * once per key however many callers are waiting. A failed load is not cached. TTL 0 disables caching.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly loads = new SingleFlight<T>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: Clock = Date.now,
  ) {}

  async get(key: string, loader: () => Promise<T>): Promise<T> {
    const entry = this.entries.get(key);
    if (entry && this.now() < entry.fetchedAt + entry.ttl) {
      return entry.value;
    }

    return this.loads.run(key, async () => {
      const value = await loader();
      if (this.ttlMs > 0) {
        this.entries.set(key, { value, fetchedAt: this.now(), ttl: this.ttlMs });
      }
      return value;
    });
  }
}
