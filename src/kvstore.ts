/**
 * Simple key-value store used to keep session state. Hosts that want sessions to survive a restart
 * plug in a durable implementation; values read back may be stale or malformed and are validated
 * by the caller.
 */
export interface KVStore<T> {
  get(key: string): T | null;
  set(key: string, value: T): void;
}

export class MemoryStore<T> implements KVStore<T> {
  private readonly store = new Map<string, T>();

  get(key: string): T | null {
    return this.store.get(key) ?? null;
  }

  set(key: string, value: T): void {
    this.store.set(key, value);
  }
}
