// --- Interfaces ---

interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

export interface StackerCache<T> {
  get(key: string): T | null;
  set(key: string, data: T, ttlMs?: number): void;
  delete(key: string): void;
  clear(): void;
  size(): number;
}

export interface StackerCacheOptions {
  defaultTtlMs?: number;
  maxEntries?: number;
}

// --- TTL + LRU implementation ---

const DEFAULT_TTL_MS = 180_000;
const DEFAULT_MAX_ENTRIES = 1000;

/**
 * In-memory cache with a per-entry TTL. Reads refresh recency; when full,
 * the least recently used entry is evicted. Writes to the index never
 * invalidate entries, so a value can be up to one TTL stale.
 */
export function createStackerCache<T>(options: StackerCacheOptions = {}): StackerCache<T> {
  const defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
  const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
  // Map iteration order is insertion order, so the first key is the least recent.
  const store = new Map<string, CacheEntry<T>>();

  return {
    get(key) {
      const entry = store.get(key);
      if (!entry) return null;

      if (Date.now() >= entry.expiresAt) {
        store.delete(key);
        return null;
      }

      store.delete(key);
      store.set(key, entry);
      return entry.data;
    },

    set(key, data, ttlMs) {
      store.delete(key);

      while (store.size >= maxEntries) {
        const oldest = store.keys().next();
        if (oldest.done) break;
        store.delete(oldest.value);
      }

      store.set(key, { data, expiresAt: Date.now() + (ttlMs ?? defaultTtlMs) });
    },

    delete(key) {
      store.delete(key);
    },

    clear() {
      store.clear();
    },

    size() {
      return store.size;
    },
  };
}

export function countsCacheKey(companyId: number): string {
  return `stacker:counts:${companyId}`;
}
