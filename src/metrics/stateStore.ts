/**
 * Latest observed state per key. `set` replaces, `delete` of a missing key is a no-op.
 *
 * Every call runs to completion on the event loop, so a `snapshot()` taken at the
 * start of an aggregation pass never sees a half-applied `set`. Stored values are
 * owned by the store: callers must not mutate them after `set`.
 */
export class StateStore<T> {
  private entries = new Map<string, T>();

  set(key: string, value: T) {
    this.entries.set(key, value);
  }

  delete(key: string) {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Values in first-insertion order of their keys. */
  snapshot(): ReadonlyArray<T> {
    return Object.freeze(Array.from(this.entries.values()));
  }
}
