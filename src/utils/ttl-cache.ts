// Keyed memo with expiry, used for provider health checks.
// Concurrent lookups of the same key share one in-flight load; a load that
// rejects is forgotten so the next lookup loads again.

interface Entry<V> {
  promise: Promise<V>;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private entries = new Map<K, Entry<V>>();

  constructor(private readonly ttlMs: number) {}

  getOrLoad(key: K, load: () => Promise<V>): Promise<V> {
    const now = Date.now();
    const existing = this.entries.get(key);
    if (existing && existing.expiresAt > now) {
      return existing.promise;
    }

    const promise = load();
    const entry: Entry<V> = { promise, expiresAt: now + this.ttlMs };
    this.entries.set(key, entry);

    promise.catch(() => {
      if (this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
    });
    return promise;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}
