/**
 * Small key/value persistence used for session snapshots. Values are plain
 * JSON-compatible data; callers validate what they read back.
 */
export interface ConfigStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;
  keys(): Promise<string[]>;
}

export class MemoryConfigStore implements ConfigStore {
  private readonly m = new Map<string, string>();

  async get(key: string): Promise<unknown> {
    const raw = this.m.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  /** Stored serialized, so later mutation of `value` does not leak in. */
  async set(key: string, value: unknown): Promise<void> {
    this.m.set(key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    this.m.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.m.keys()];
  }
}
