/** Blob store keyed by string; the shape of window.localStorage. */
export interface KeyValueStore {
  restore(key: string): string | null;
  store(key: string, blob: string): void;
}

export type WebStorageLike = {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
};

export function createWebStorageStore(storage: WebStorageLike): KeyValueStore {
  return {
    restore: (key) => storage.getItem(key),
    store: (key, blob) => storage.setItem(key, blob),
  };
}

export function createMemoryStore(seed: Record<string, string> = {}): KeyValueStore {
  const data = new Map<string, string>(Object.entries(seed));
  return {
    restore: (key) => data.get(key) ?? null,
    store: (key, blob) => { data.set(key, blob); },
  };
}

function isWebStorage(v: unknown): v is WebStorageLike {
  if (typeof v !== 'object' || v === null) return false;
  const rec = v as Record<string, unknown>;
  return typeof rec.getItem === 'function' && typeof rec.setItem === 'function';
}

/**
 * localStorage when the host has one, otherwise null.
 * Some browsers throw on access when storage is disabled.
 */
export function openBrowserStore(): KeyValueStore | null {
  let storage: unknown;
  try {
    storage = Reflect.get(globalThis, 'localStorage');
  } catch {
    return null;
  }
  return isWebStorage(storage) ? createWebStorageStore(storage) : null;
}
