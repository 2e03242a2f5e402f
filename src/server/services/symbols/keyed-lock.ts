/**
 * keyed-lock.ts — Per-key async mutex.
 *
 * Callers for the same key run one at a time, in arrival order. Different
 * keys never wait on each other. A key's chain is dropped from the map once
 * the last holder releases, so the registry only holds keys in use.
 */

export interface KeyedLock {
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
  /** Keys currently held or waited on. */
  size(): number;
}

export function createKeyedLock(): KeyedLock {
  const chains = new Map<string, Promise<void>>();

  return {
    async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
      const previous = chains.get(key) ?? Promise.resolve();
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      // `previous` never rejects: every link is a gate that only resolves.
      const chain = previous.then(() => gate);
      chains.set(key, chain);

      await previous;
      try {
        return await fn();
      } finally {
        release();
        if (chains.get(key) === chain) {
          chains.delete(key);
        }
      }
    },

    size() {
      return chains.size;
    },
  };
}
