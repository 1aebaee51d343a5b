type Entry<V> = {
  value: V;
  expiresAt: number;
};

/**
 * In-process key/value map with per-entry expiry. Reads are not coordinated with
 * writes: two callers may both miss and both write.
 */
export class TtlStore<V> {
  private readonly records = new Map<string, Entry<V>>();

  constructor(
    private readonly defaultTtlMs: number,
    private readonly now: () => number = () => Date.now(),
  ) {}

  get(key: string): V | undefined {
    const record = this.records.get(key);
    if (!record) return undefined;
    if (this.now() >= record.expiresAt) {
      this.records.delete(key);
      return undefined;
    }
    return record.value;
  }

  set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    this.evictExpired();
    this.records.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [key, record] of this.records) {
      if (now >= record.expiresAt) {
        this.records.delete(key);
      }
    }
  }
}
