/**
 * Durable key-value storage for small pieces of sync state.
 *
 * The shape follows the Web Storage API so `localStorage` satisfies it
 * directly. Operations are synchronous; a single call is atomic with respect
 * to other callers on the event loop.
 */
export interface PreferenceStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
  /** All keys currently stored */
  keys(): string[];
}

/**
 * Read a JSON value, returning null when the key is absent
 */
export function readJsonPreference(store: PreferenceStore, key: string): unknown {
  const raw = store.getItem(key);
  if (raw === null) return null;
  return JSON.parse(raw) as unknown;
}

/**
 * Write a JSON value
 */
export function writeJsonPreference(store: PreferenceStore, key: string, value: unknown): void {
  store.setItem(key, JSON.stringify(value));
}
