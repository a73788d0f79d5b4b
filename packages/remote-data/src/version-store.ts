import {
  InAppError,
  compareRemoteDataMetadata,
  readJsonPreference,
  writeJsonPreference,
  type PreferenceStore,
  type RemoteDataMetadata,
  type RemoteDataSource,
} from '@inapp/core';
import { z } from 'zod';
import { noopLogger, type Logger } from './logger.js';

/**
 * What the store remembers about one remote source
 */
export interface VersionRecord {
  /** Metadata of the last payload whose reconcile was committed */
  metadata: RemoteDataMetadata;
  /** Schedules known to originate from that payload */
  scheduleIds: string[];
  /** When the commit happened (Unix ms) */
  committedAt: number;
}

/**
 * Result of {@link VersionStore.commit}
 */
export type CommitResult =
  | { status: 'committed'; record: VersionRecord }
  | { status: 'stale'; current: RemoteDataMetadata };

export interface VersionStoreOptions {
  /** Preference key prefix (default: `inapp_remote_data`) */
  storageKeyPrefix?: string;
  logger?: Logger;
  now?: () => number;
}

const metadataSchema = z.object({
  source: z.string(),
  version: z.number(),
  lastModified: z.string().optional(),
});

const recordsSchema = z.record(
  z.object({
    metadata: metadataSchema,
    scheduleIds: z.array(z.string()),
    committedAt: z.number(),
  })
);

/**
 * Persists the last processed remote data version per source.
 *
 * Versions only move forward. A commit carrying metadata older than what is
 * already stored is rejected, so a slow fetch that finishes after a newer one
 * cannot roll a source back:
 *
 * ```
 * commit(app, v2, …)  → committed
 * commit(app, v1, …)  → stale (store keeps v2)
 * commit(app, v2, …)  → committed (same version replays)
 * ```
 *
 * Commits are synchronous, so each one is atomic on the event loop.
 *
 * @example
 * ```typescript
 * const versions = new VersionStore(preferences);
 *
 * const result = versions.commit('app', metadata, ['welcome', 'sale']);
 * if (result.status === 'stale') {
 *   // a newer payload already won; discard this cycle
 * }
 * ```
 */
export class VersionStore {
  private readonly preferences: PreferenceStore;
  private readonly recordsKey: string;
  private readonly logger: Logger;
  private readonly now: () => number;
  private records: Map<RemoteDataSource, VersionRecord> | null = null;

  constructor(preferences: PreferenceStore, options: VersionStoreOptions = {}) {
    const prefix = options.storageKeyPrefix ?? 'inapp_remote_data';
    this.preferences = preferences;
    this.recordsKey = `${prefix}.versions`;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Last processed metadata for a source
   */
  get(source: RemoteDataSource): RemoteDataMetadata | undefined {
    return this.load().get(source)?.metadata;
  }

  getRecord(source: RemoteDataSource): VersionRecord | undefined {
    const record = this.load().get(source);
    return record ? { ...record, scheduleIds: [...record.scheduleIds] } : undefined;
  }

  /**
   * Schedule identifiers committed for a source
   */
  getScheduleIds(source: RemoteDataSource): ReadonlySet<string> {
    return new Set(this.load().get(source)?.scheduleIds ?? []);
  }

  sources(): RemoteDataSource[] {
    return Array.from(this.load().keys());
  }

  hasRecords(): boolean {
    return this.load().size > 0;
  }

  /**
   * Replace the metadata and schedule set for a source, unless the stored
   * metadata is strictly newer.
   */
  commit(
    source: RemoteDataSource,
    metadata: RemoteDataMetadata,
    scheduleIds: Iterable<string>
  ): CommitResult {
    if (metadata.source !== source) {
      throw new InAppError({
        code: 'INAPP_X900',
        message: `Metadata for source "${metadata.source}" committed under "${source}"`,
        context: { source, metadataSource: metadata.source },
      });
    }

    const records = this.load();
    const current = records.get(source);

    if (current && compareRemoteDataMetadata(current.metadata, metadata) > 0) {
      this.logger.debug('Rejected stale commit', {
        source,
        currentVersion: current.metadata.version,
        version: metadata.version,
      });
      return { status: 'stale', current: { ...current.metadata } };
    }

    const record: VersionRecord = {
      metadata: { ...metadata },
      scheduleIds: Array.from(new Set(scheduleIds)).sort(),
      committedAt: this.now(),
    };
    records.set(source, record);
    this.save(records);

    return { status: 'committed', record: { ...record, scheduleIds: [...record.scheduleIds] } };
  }

  private load(): Map<RemoteDataSource, VersionRecord> {
    if (this.records) return this.records;

    const records = new Map<RemoteDataSource, VersionRecord>();
    let stored: unknown = null;
    try {
      stored = readJsonPreference(this.preferences, this.recordsKey);
    } catch (error) {
      this.logger.warn('Stored versions are not valid JSON, starting empty', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (stored !== null) {
      const parsed = recordsSchema.safeParse(stored);
      if (parsed.success) {
        for (const [source, record] of Object.entries(parsed.data)) {
          records.set(source, record);
        }
      } else {
        this.logger.warn('Stored versions have an unexpected shape, starting empty', {
          issues: parsed.error.issues.length,
        });
      }
    }

    this.records = records;
    return records;
  }

  private save(records: Map<RemoteDataSource, VersionRecord>): void {
    writeJsonPreference(this.preferences, this.recordsKey, Object.fromEntries(records));
  }
}
