import type { PreferenceStore } from '@inapp/core';
import { noopLogger, type Logger } from './logger.js';

/**
 * Cutoff used for installs that predate new-user targeting.
 * No message can be created before it, so such installs are never "new".
 */
export const DISTANT_PAST = -8_640_000_000_000_000;

export interface CutoffPolicyOptions {
  /** Preference key prefix (default: `inapp_remote_data`) */
  storageKeyPrefix?: string;
  logger?: Logger;
  now?: () => number;
}

/**
 * Holds the instant before which messages count as created for this install.
 *
 * Resolved once, on the first run: a fresh install stores "now", an install
 * that already holds remote data stores {@link DISTANT_PAST}. The value is
 * read-only afterwards.
 */
export class CutoffPolicy {
  private readonly preferences: PreferenceStore;
  private readonly storageKey: string;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(preferences: PreferenceStore, options: CutoffPolicyOptions = {}) {
    this.preferences = preferences;
    this.storageKey = `${options.storageKeyPrefix ?? 'inapp_remote_data'}.new_user_cutoff`;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * The stored cutoff, or null before {@link resolve} ran
   */
  get newUserCutOffTime(): number | null {
    const raw = this.preferences.getItem(this.storageKey);
    if (raw === null) return null;

    const value = Number(raw);
    return Number.isFinite(value) ? value : null;
  }

  /**
   * Return the cutoff, storing it first when this is the first run.
   *
   * @param hasExistingData - Whether the install already holds remote data
   */
  resolve(hasExistingData: boolean): number {
    const stored = this.newUserCutOffTime;
    if (stored !== null) return stored;

    const cutoff = hasExistingData ? DISTANT_PAST : this.now();
    this.preferences.setItem(this.storageKey, String(cutoff));
    this.logger.info('Resolved new user cutoff', {
      cutoff,
      existingInstall: hasExistingData,
    });
    return cutoff;
  }
}
