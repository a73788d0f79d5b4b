import type { PreferenceStore } from './preference-store.js';

/**
 * In-memory preference store. Contents are lost when the process exits.
 */
export class MemoryPreferenceStore implements PreferenceStore {
  private readonly values = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) {
        this.values.set(key, value);
      }
    }
  }

  getItem(key: string): string | null {
    return this.values.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.values.set(key, value);
  }

  removeItem(key: string): void {
    this.values.delete(key);
  }

  keys(): string[] {
    return Array.from(this.values.keys());
  }

  clear(): void {
    this.values.clear();
  }
}

/**
 * Create an in-memory preference store
 */
export function createMemoryPreferenceStore(initial?: Record<string, string>): MemoryPreferenceStore {
  return new MemoryPreferenceStore(initial);
}
