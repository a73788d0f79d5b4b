import * as fs from 'node:fs';
import * as path from 'node:path';
import { StorageError } from '../errors/inapp-error.js';
import type { PreferenceStore } from './preference-store.js';

/**
 * Preference store persisted as a single JSON object on disk.
 *
 * The file is read once on construction and rewritten synchronously on every
 * mutation, so a value returned by `setItem` survives a process restart.
 *
 * @example
 * ```typescript
 * const preferences = new FilePreferenceStore('./data/preferences.json');
 * preferences.setItem('inapp_remote_data.cutoff', '1700000000000');
 * ```
 */
export class FilePreferenceStore implements PreferenceStore {
  private readonly filePath: string;
  private values: Record<string, string>;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.values = this.load();
  }

  getItem(key: string): string | null {
    return Object.prototype.hasOwnProperty.call(this.values, key) ? (this.values[key] ?? null) : null;
  }

  setItem(key: string, value: string): void {
    this.values = { ...this.values, [key]: value };
    this.save();
  }

  removeItem(key: string): void {
    if (!Object.prototype.hasOwnProperty.call(this.values, key)) return;
    const next = { ...this.values };
    delete next[key];
    this.values = next;
    this.save();
  }

  keys(): string[] {
    return Object.keys(this.values);
  }

  private load(): Record<string, string> {
    if (!fs.existsSync(this.filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new StorageError(
        'Preference file could not be read',
        { filePath: this.filePath },
        error instanceof Error ? error : undefined
      );
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new StorageError('Preference file must contain a JSON object', {
        filePath: this.filePath,
      });
    }

    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        values[key] = value;
      }
    }
    return values;
  }

  private save(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tmpPath = `${this.filePath}.tmp`;
      fs.writeFileSync(tmpPath, JSON.stringify(this.values, null, 2), 'utf-8');
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      throw new StorageError(
        'Preference file could not be written',
        { filePath: this.filePath },
        error instanceof Error ? error : undefined
      );
    }
  }
}

/**
 * Create a file-backed preference store
 */
export function createFilePreferenceStore(filePath: string): FilePreferenceStore {
  return new FilePreferenceStore(filePath);
}
