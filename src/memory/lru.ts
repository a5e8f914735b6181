export interface LruOptions {
  /** Live entries kept at most; the least recently used goes first. */
  maxEntries: number;
  /** Entries older than this read as absent. Unset means no expiry. */
  ttlMs?: number;
  now?: () => number;
}

interface Slot<V> {
  value: V;
  storedAt: number;
}

/**
 * String-keyed LRU with optional expiry. Recency is the Map's insertion
 * order: a read or overwrite moves the key to the end.
 */
export class LruCache<V> {
  private readonly slots = new Map<string, Slot<V>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number | undefined;
  private readonly now: () => number;

  constructor(opts: LruOptions) {
    if (!Number.isFinite(opts.maxEntries)) throw new RangeError(`maxEntries must be a finite number, got ${opts.maxEntries}`);
    this.maxEntries = Math.max(1, Math.floor(opts.maxEntries));
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? (() => Date.now());
  }

  get size(): number {
    this.sweep();
    return this.slots.size;
  }

  get(key: string): V | undefined {
    const slot = this.live(key);
    if (!slot) return undefined;
    this.slots.delete(key);
    this.slots.set(key, slot);
    return slot.value;
  }

  /** Reads without touching recency. */
  peek(key: string): V | undefined {
    return this.live(key)?.value;
  }

  has(key: string): boolean {
    return this.live(key) !== undefined;
  }

  /** Stores `value` as the most recent entry; returns the keys evicted to make room. */
  set(key: string, value: V): string[] {
    this.slots.delete(key);
    this.slots.set(key, { value, storedAt: this.now() });
    this.sweep();
    const evicted: string[] = [];
    for (const oldest of this.slots.keys()) {
      if (this.slots.size <= this.maxEntries) break;
      this.slots.delete(oldest);
      evicted.push(oldest);
    }
    return evicted;
  }

  /** False when there was no live entry. */
  delete(key: string): boolean {
    return this.live(key) !== undefined && this.slots.delete(key);
  }

  /** Least recently used first. */
  keys(): string[] {
    this.sweep();
    return [...this.slots.keys()];
  }

  clear(): void {
    this.slots.clear();
  }

  private live(key: string): Slot<V> | undefined {
    const slot = this.slots.get(key);
    if (slot && this.expired(slot)) {
      this.slots.delete(key);
      return undefined;
    }
    return slot;
  }

  private expired(slot: Slot<V>): boolean {
    return this.ttlMs !== undefined && this.now() - slot.storedAt > this.ttlMs;
  }

  private sweep(): void {
    if (this.ttlMs === undefined) return;
    for (const [key, slot] of this.slots) {
      if (this.expired(slot)) this.slots.delete(key);
    }
  }
}
