export type Clock = () => number;

/**
 * In-memory map that goes stale as a whole.
 *
 * Entries are replaced wholesale per key. Freshness is tracked once for the
 * store, from the last {@link MemoryCache.markRefreshed} call, rather than
 * per entry. An empty store is never fresh.
 */
export class MemoryCache<T> {
  private entries = new Map<string, T>();
  private refreshedAt: number | null = null;

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = Date.now
  ) {}

  set(key: string, value: T): void {
    this.entries.set(key, value);
  }

  get(key: string): T | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  markRefreshed(): void {
    this.refreshedAt = this.clock();
  }

  isFresh(): boolean {
    if (this.refreshedAt === null || this.entries.size === 0) return false;
    return this.clock() - this.refreshedAt < this.ttlMs;
  }

  toObject(): Record<string, T> {
    return Object.fromEntries(this.entries);
  }
}
