/**
 * Lookup-or-compute-and-store table. The first `get` for a key runs `compute`
 * and keeps its result; later calls return the stored value. Keys compare by
 * `Map` semantics, so object keys are matched by identity.
 */
export class KeyedMemo<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(private readonly compute: (key: K) => V) {}

  get(key: K): V {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const value = this.compute(key);
    this.entries.set(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Memoizes an async computation per key. A rejected computation is evicted
 * before callers observe the rejection, so the next lookup runs it again.
 */
export const memoizeAsync = <K, V>(compute: (key: K) => Promise<V>): KeyedMemo<K, Promise<V>> => {
  const memo: KeyedMemo<K, Promise<V>> = new KeyedMemo((key: K) => {
    const pending = compute(key);
    pending.catch(() => {
      memo.delete(key);
    });
    return pending;
  });
  return memo;
};
