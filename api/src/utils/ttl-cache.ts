/**
 * In-memory TTL cache for upstream lookups.
 *
 * Entries expire lazily on read. Writes past `maxEntries` prune expired
 * entries first, then the oldest. `null` is a legitimate cached value, so
 * negative lookups can be remembered too.
 */

interface Entry<V> {
  value: V;
  storedAt: number;
}

export class TtlCache<V> {
  private entries = new Map<string, Entry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
    private readonly maxEntries: number = Infinity,
  ) {}

  /** Cached value, or undefined on a miss or an expired entry. */
  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    const now = this.now();
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      this.prune(now);
    }
    this.entries.set(key, { value, storedAt: now });
  }

  private prune(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now - entry.storedAt >= this.ttlMs) this.entries.delete(key);
    }
    // Map order is insertion order, so the first keys are the oldest
    for (const key of this.entries.keys()) {
      if (this.entries.size < this.maxEntries) break;
      this.entries.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
