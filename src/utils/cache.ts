export class TtlCache<K, V> {
  private readonly store = new Map<K, { expiresAt: number; value: V }>();

  constructor(private readonly now: () => number = Date.now) {}

  get(key: K): V | null {
    const entry = this.store.get(key);
    if (!entry) {
      return null;
    }

    if (this.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    return entry.value;
  }

  set(key: K, value: V, ttlMs: number): void {
    this.store.set(key, {
      expiresAt: this.now() + ttlMs,
      value,
    });
  }

  /** Returns the cached value, or loads, stores and returns a fresh one. */
  async getOrLoad(key: K, ttlMs: number, load: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== null) {
      return cached;
    }

    const value = await load();
    this.set(key, value, ttlMs);
    return value;
  }

  delete(key: K): void {
    this.store.delete(key);
  }
}
