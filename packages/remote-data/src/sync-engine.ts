import {
  InAppError,
  compareRemoteDataMetadata,
  ensureInAppError,
  type PreferenceStore,
  type RemoteDataInfo,
  type RemoteDataSource,
  type Schedule,
  type ScheduleEdits,
} from '@inapp/core';
import { BehaviorSubject, Subject, takeUntil, type Observable, type Subscription } from 'rxjs';
import { CutoffPolicy } from './cutoff-policy.js';
import type { ScheduleDelegate } from './delegate.js';
import { resolveLogger, type Logger, type LoggerOptions } from './logger.js';
import { parseRemotePayload } from './payload-parser.js';
import { RefreshCoordinator } from './refresh-coordinator.js';
import { deepEqual, reconcile } from './schedule-reconciler.js';
import { StalenessTracker } from './staleness-tracker.js';
import type { RemoteDataPayload, RemoteDataProvider } from './transport/types.js';
import type { RefreshOutcome } from './types.js';
import { VersionStore } from './version-store.js';

/**
 * Sync status
 */
export type RemoteDataSyncStatus = 'idle' | 'syncing' | 'error';

/**
 * Sync statistics
 */
export interface RemoteDataSyncStats {
  fetchCount: number;
  reconcileCount: number;
  createdCount: number;
  updatedCount: number;
  deletedCount: number;
  /** Cycles discarded because a newer payload was already committed */
  staleCount: number;
  failureCount: number;
  lastSyncAt: number | null;
  lastError: InAppError | null;
}

/**
 * Remote data sync configuration
 */
export interface RemoteDataSyncConfig {
  /** Fetches payloads and announces changes */
  provider: RemoteDataProvider;
  /** Scheduler that owns the schedules */
  delegate: ScheduleDelegate;
  /** Durable storage for versions and the new user cutoff */
  preferences: PreferenceStore;
  /** Sources to keep in sync (default: `['app']`) */
  sources?: RemoteDataSource[];
  /** Running SDK version, compared with `min_sdk_version` (default: `'0.0.0'`) */
  sdkVersion?: string;
  /** Preference key prefix (default: `inapp_remote_data`) */
  storageKeyPrefix?: string;
  /** Logger options for structured logging */
  logger?: LoggerOptions | Logger | false;
  /** Clock (default: `Date.now`) */
  now?: () => number;
}

/**
 * Keeps the delegate's schedules in line with remote data.
 *
 * Every change notification for a configured source runs one cycle:
 * fetch → parse → reconcile → apply (create, update, delete) → commit.
 * Cycles of one source never overlap; cycles of different sources are
 * independent.
 *
 * @example
 * ```typescript
 * const engine = new RemoteDataSyncEngine({
 *   provider,
 *   delegate: scheduler,
 *   preferences: createFilePreferenceStore('./data/preferences.json'),
 *   sources: ['app', 'contact'],
 * });
 *
 * engine.subscribe();
 *
 * // before displaying a message
 * if (await engine.waitFullRefresh(schedule)) {
 *   display(schedule);
 * }
 * ```
 */
export class RemoteDataSyncEngine {
  private readonly provider: RemoteDataProvider;
  private readonly delegate: ScheduleDelegate;
  private readonly config: {
    sources: RemoteDataSource[];
    sdkVersion: string;
    now: () => number;
  };
  private readonly logger: Logger;
  private readonly versions: VersionStore;
  private readonly cutoff: CutoffPolicy;
  private readonly staleness: StalenessTracker;
  private readonly coordinator: RefreshCoordinator;

  private readonly status$ = new BehaviorSubject<RemoteDataSyncStatus>('idle');
  private readonly stats$ = new BehaviorSubject<RemoteDataSyncStats>({
    fetchCount: 0,
    reconcileCount: 0,
    createdCount: 0,
    updatedCount: 0,
    deletedCount: 0,
    staleCount: 0,
    failureCount: 0,
    lastSyncAt: null,
    lastError: null,
  });

  private readonly destroy$ = new Subject<void>();
  private changeSubscription: Subscription | null = null;
  /** Bumped on every unsubscribe; cycles from an older session stop before touching the delegate */
  private session = 0;
  private activeCycles = 0;
  /** Sources reported outdated since their last settled cycle */
  private readonly outdatedSources = new Set<RemoteDataSource>();

  constructor(config: RemoteDataSyncConfig) {
    this.provider = config.provider;
    this.delegate = config.delegate;
    this.config = {
      sources: Array.from(new Set(config.sources ?? ['app'])),
      sdkVersion: config.sdkVersion ?? '0.0.0',
      now: config.now ?? Date.now,
    };

    this.logger = resolveLogger(config.logger, 'RemoteDataSyncEngine');

    const storeOptions = { storageKeyPrefix: config.storageKeyPrefix, now: this.config.now };
    this.versions = new VersionStore(config.preferences, {
      ...storeOptions,
      logger: this.logger.child('VersionStore'),
    });
    this.cutoff = new CutoffPolicy(config.preferences, {
      ...storeOptions,
      logger: this.logger.child('CutoffPolicy'),
    });
    this.staleness = new StalenessTracker(this.versions);
    this.coordinator = new RefreshCoordinator((source) => this.runCycle(source), {
      logger: this.logger.child('RefreshCoordinator'),
    });

    this.logger.debug('RemoteDataSyncEngine initialized', {
      sources: this.config.sources,
      sdkVersion: this.config.sdkVersion,
    });
  }

  /**
   * Whether change notifications are being processed
   */
  get isSubscribed(): boolean {
    return this.changeSubscription !== null;
  }

  /**
   * New user cutoff of this install, or null before the first cycle
   */
  get newUserCutOffTime(): number | null {
    return this.cutoff.newUserCutOffTime;
  }

  /**
   * Start processing change notifications and reconcile every source once
   */
  subscribe(): void {
    if (this.changeSubscription) {
      this.logger.debug('Subscribe called but already subscribed');
      return;
    }

    this.logger.info('Subscribing to remote data changes', { sources: this.config.sources });

    this.changeSubscription = this.provider
      .changes()
      .pipe(takeUntil(this.destroy$))
      .subscribe({
        next: (change) => this.handleChange(change.source),
        error: (error: unknown) => {
          this.logger.error('Remote data change stream failed', error);
        },
      });

    for (const source of this.config.sources) {
      this.coordinator.notifyChanged(source);
    }
  }

  /**
   * Stop processing change notifications. Pending refresh waiters resolve
   * as not refreshed.
   */
  unsubscribe(): void {
    if (!this.changeSubscription) return;

    this.logger.info('Unsubscribing from remote data changes');
    this.changeSubscription.unsubscribe();
    this.changeSubscription = null;
    this.session++;
    this.coordinator.abandonAll();
  }

  /**
   * Refresh a source now, joining the cycle already in flight. Resolves
   * `abandoned` without I/O while unsubscribed or for unconfigured sources.
   */
  async refreshSource(source: RemoteDataSource): Promise<RefreshOutcome> {
    if (!this.canRefresh(source)) {
      return { status: 'abandoned', source };
    }
    return this.coordinator.refresh(source);
  }

  /**
   * Outcome of every refresh cycle, in completion order
   */
  settled(): Observable<RefreshOutcome> {
    return this.coordinator.settled().pipe(takeUntil(this.destroy$));
  }

  /**
   * True when the schedule carries the last processed metadata of its
   * source, or is not sourced from remote data. A source reported through
   * {@link notifyOutdatedSchedule} counts as outdated until its next
   * cycle settles.
   */
  isScheduleUpToDate(schedule: Schedule): boolean {
    return this.isFresh(schedule);
  }

  /**
   * True when freshness cannot be judged without fetching the schedule's source
   */
  scheduleRequiresRefresh(schedule: Schedule): boolean {
    const info = schedule.remoteDataInfo;
    if (info && this.outdatedSources.has(info.source)) return true;
    return this.staleness.requiresRefresh(schedule);
  }

  /**
   * Refresh the schedule's source once, joining a fetch already in flight,
   * and tell whether the schedule is now up to date.
   */
  async bestEffortRefresh(schedule: Schedule): Promise<boolean> {
    const info = schedule.remoteDataInfo;
    if (!info) return true;
    if (this.isFresh(schedule)) return true;
    if (!this.canRefresh(info.source)) return false;

    const session = this.session;
    const outcome = await this.coordinator.refresh(info.source);
    if (outcome.status === 'abandoned' || session !== this.session) {
      return false;
    }

    const current = await this.readSchedule(schedule.id);
    return current !== undefined && this.isFresh(current);
  }

  /**
   * Wait until the schedule is up to date, fetching when nothing is in
   * flight. Resolves false when a cycle fails, the engine is unsubscribed
   * or the schedule is removed. There is no timeout.
   */
  async waitFullRefresh(schedule: Schedule): Promise<boolean> {
    const info = schedule.remoteDataInfo;
    if (!info) return true;
    if (this.isFresh(schedule)) return true;
    if (!this.canRefresh(info.source)) return false;

    const source = info.source;
    const session = this.session;
    let outcome = await this.coordinator.refresh(source);

    while (outcome.status !== 'abandoned' && session === this.session) {
      if (outcome.status === 'failed') {
        this.logger.debug('Full refresh ended by a failed cycle', {
          source,
          scheduleId: schedule.id,
          code: outcome.error.code,
        });
        return false;
      }

      const next = this.coordinator.awaitNextSettle(source);
      const current = await this.readSchedule(schedule.id);
      if (session !== this.session || !current) return false;
      if (this.isFresh(current)) return true;

      this.logger.debug('Schedule still outdated, waiting for the next refresh', {
        source,
        scheduleId: schedule.id,
      });
      outcome = await next;
    }

    return false;
  }

  /**
   * Record that the schedule's source is known to be outdated and tell the
   * provider. No-op for schedules not sourced from remote data.
   */
  async notifyOutdatedSchedule(schedule: Schedule): Promise<void> {
    const info = schedule.remoteDataInfo;
    if (!info) return;

    this.outdatedSources.add(info.source);
    this.coordinator.invalidate(info.source);
    this.logger.debug('Schedule reported outdated', {
      source: info.source,
      scheduleId: schedule.id,
    });

    if (!this.provider.notifyOutdated) return;
    try {
      await this.provider.notifyOutdated(this.remoteDataInfoFromSchedule(schedule) ?? info);
    } catch (error) {
      this.logger.warn('Provider rejected outdated notification', {
        source: info.source,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Copy of the schedule's remote data info
   */
  remoteDataInfoFromSchedule(schedule: Schedule): RemoteDataInfo | null {
    const info = schedule.remoteDataInfo;
    return info ? { ...info, metadata: { ...info.metadata } } : null;
  }

  /**
   * Get sync status observable
   */
  getStatus(): Observable<RemoteDataSyncStatus> {
    return this.status$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /**
   * Get sync stats observable
   */
  getStats(): Observable<RemoteDataSyncStats> {
    return this.stats$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /**
   * Destroy the sync engine
   */
  destroy(): void {
    this.unsubscribe();
    this.coordinator.destroy();
    this.destroy$.next();
    this.destroy$.complete();
    this.status$.complete();
    this.stats$.complete();
  }

  private handleChange(source: RemoteDataSource): void {
    if (!this.config.sources.includes(source)) {
      this.logger.debug('Ignoring change of unconfigured source', { source });
      return;
    }
    this.coordinator.notifyChanged(source);
  }

  private canRefresh(source: RemoteDataSource): boolean {
    if (!this.isSubscribed) {
      this.logger.debug('Not subscribed, answering from local state', { source });
      return false;
    }
    if (!this.config.sources.includes(source)) {
      this.logger.debug('Schedule belongs to an unconfigured source', { source });
      return false;
    }
    return true;
  }

  private isFresh(schedule: Schedule): boolean {
    const info = schedule.remoteDataInfo;
    if (info && this.outdatedSources.has(info.source)) return false;
    return this.staleness.isUpToDate(schedule);
  }

  private async readSchedule(id: string): Promise<Schedule | undefined> {
    try {
      const schedules = await this.delegate.getSchedules();
      return schedules.find((schedule) => schedule.id === id);
    } catch (error) {
      this.logger.warn('Failed to read schedules from delegate', {
        scheduleId: id,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private async runCycle(source: RemoteDataSource): Promise<RefreshOutcome> {
    this.activeCycles++;
    this.status$.next('syncing');

    let outcome: RefreshOutcome;
    try {
      outcome = await this.syncSource(source, this.session);
    } catch (error) {
      outcome = this.fail(source, ensureInAppError(error, 'INAPP_X900', { source }));
    }

    this.activeCycles--;
    if (outcome.status === 'failed') {
      this.status$.next('error');
    } else if (this.activeCycles === 0) {
      this.status$.next('idle');
    }
    return outcome;
  }

  /**
   * One fetch → reconcile → apply → commit pass
   */
  private async syncSource(source: RemoteDataSource, session: number): Promise<RefreshOutcome> {
    this.updateStats({ fetchCount: this.stats$.getValue().fetchCount + 1 });
    this.logger.debug('Fetching remote data', { source });

    let raw: RemoteDataPayload;
    try {
      raw = await this.provider.fetch(source);
    } catch (error) {
      return this.fail(source, ensureInAppError(error, 'INAPP_R100', { source }));
    }

    if (session !== this.session) {
      this.logger.debug('Discarding fetch finished after unsubscribe', { source });
      return { status: 'abandoned', source };
    }

    if (raw.source !== source) {
      return this.fail(
        source,
        new InAppError({
          code: 'INAPP_V300',
          message: `Requested "${source}" but received a payload for "${raw.source}"`,
          context: { source, payloadSource: raw.source },
        })
      );
    }

    let parsed: ReturnType<typeof parseRemotePayload>;
    try {
      parsed = parseRemotePayload(raw);
    } catch (error) {
      return this.fail(source, ensureInAppError(error, 'INAPP_V300', { source }));
    }

    for (const entry of parsed.invalid) {
      this.logger.warn('Skipped invalid in-app message', {
        source,
        index: entry.index,
        error: entry.error.message,
      });
    }

    const { payload } = parsed;
    const current = this.versions.get(source);
    if (current && compareRemoteDataMetadata(current, payload.metadata) > 0) {
      this.logger.info('Discarded payload older than the processed version', {
        source,
        code: 'INAPP_R101',
        currentVersion: current.version,
        version: payload.metadata.version,
      });
      this.outdatedSources.delete(source);
      this.updateStats({ staleCount: this.stats$.getValue().staleCount + 1 });
      return { status: 'stale', source, current };
    }

    if (payload.constraints !== undefined) {
      try {
        await this.delegate.setConstraints(payload.constraints);
      } catch (error) {
        this.reportPersistenceFailure(
          ensureInAppError(error, 'INAPP_P200', { source, operation: 'setConstraints' })
        );
      }
    }

    let schedules: Schedule[];
    try {
      schedules = await this.delegate.getSchedules();
    } catch (error) {
      return this.fail(
        source,
        ensureInAppError(error, 'INAPP_P200', { source, operation: 'getSchedules' })
      );
    }

    const cutoffTime = this.cutoff.resolve(
      this.versions.hasRecords() || schedules.some((schedule) => schedule.remoteDataInfo !== null)
    );

    const held = new Map(schedules.map((schedule) => [schedule.id, schedule]));
    const previousScheduleIds = new Set(this.versions.getScheduleIds(source));
    for (const schedule of schedules) {
      if (schedule.remoteDataInfo?.source === source) {
        previousScheduleIds.add(schedule.id);
      }
    }

    const diff = reconcile({
      previousScheduleIds,
      previousSchedules: held,
      payload,
      cutoffTime,
      now: this.config.now(),
      sdkVersion: this.config.sdkVersion,
    });
    this.updateStats({ reconcileCount: this.stats$.getValue().reconcileCount + 1 });

    if (diff.skipped.length > 0) {
      this.logger.debug('Drafts treated as absent', { source, skipped: diff.skipped });
    }

    const committedIds = new Set<string>();

    if (diff.toCreate.length > 0) {
      const ids = diff.toCreate.map((schedule) => schedule.id);
      const created = await this.persist(() => this.delegate.scheduleMultiple(diff.toCreate), {
        source,
        operation: 'scheduleMultiple',
        scheduleIds: ids,
      });
      if (created) {
        ids.forEach((id) => committedIds.add(id));
        this.updateStats({ createdCount: this.stats$.getValue().createdCount + ids.length });
      }
    }

    for (const update of diff.toUpdate) {
      const existing = held.get(update.id);
      if (!existing) {
        this.logger.debug('Skipped update of schedule the delegate no longer holds', {
          source,
          scheduleId: update.id,
        });
        committedIds.add(update.id);
        continue;
      }
      if (isNoOpEdit(update.edits, existing)) {
        committedIds.add(update.id);
        continue;
      }

      const edited = await this.persist(() => this.delegate.editSchedule(update.id, update.edits), {
        source,
        operation: 'editSchedule',
        scheduleId: update.id,
      });
      if (edited) {
        committedIds.add(update.id);
        this.updateStats({ updatedCount: this.stats$.getValue().updatedCount + 1 });
      }
    }

    if (diff.toDelete.length > 0) {
      const cancelled = await this.persist(() => this.delegate.cancelSchedules(diff.toDelete), {
        source,
        operation: 'cancelSchedules',
        scheduleIds: diff.toDelete,
      });
      if (cancelled) {
        this.updateStats({
          deletedCount: this.stats$.getValue().deletedCount + diff.toDelete.length,
        });
      } else {
        diff.toDelete.forEach((id) => committedIds.add(id));
      }
    }

    let result: ReturnType<VersionStore['commit']>;
    try {
      result = this.versions.commit(source, payload.metadata, committedIds);
    } catch (error) {
      return this.fail(source, ensureInAppError(error, 'INAPP_S400', { source }));
    }

    if (result.status === 'stale') {
      this.logger.info('Discarded reconcile superseded by a newer commit', {
        source,
        code: 'INAPP_R101',
        currentVersion: result.current.version,
        version: payload.metadata.version,
      });
      this.outdatedSources.delete(source);
      this.updateStats({ staleCount: this.stats$.getValue().staleCount + 1 });
      return { status: 'stale', source, current: result.current };
    }

    this.outdatedSources.delete(source);
    this.updateStats({ lastSyncAt: this.config.now() });
    this.logger.info('Remote data reconciled', {
      source,
      version: result.record.metadata.version,
      created: diff.toCreate.length,
      updated: diff.toUpdate.length,
      deleted: diff.toDelete.length,
    });

    return { status: 'settled', source, metadata: result.record.metadata };
  }

  private async persist(run: () => Promise<boolean>, context: Record<string, unknown>): Promise<boolean> {
    try {
      if (await run()) return true;
      this.reportPersistenceFailure(InAppError.fromCode('INAPP_P200', context));
    } catch (error) {
      this.reportPersistenceFailure(ensureInAppError(error, 'INAPP_P200', context));
    }
    return false;
  }

  private reportPersistenceFailure(error: InAppError): void {
    this.logger.error('Schedule persistence failed', error, error.context);
    this.updateStats({
      failureCount: this.stats$.getValue().failureCount + 1,
      lastError: error,
    });
  }

  private fail(source: RemoteDataSource, error: InAppError): RefreshOutcome {
    this.logger.error('Remote data refresh failed', error, { source, code: error.code });
    this.updateStats({
      failureCount: this.stats$.getValue().failureCount + 1,
      lastError: error,
    });
    return { status: 'failed', source, error };
  }

  private updateStats(update: Partial<RemoteDataSyncStats>): void {
    this.stats$.next({ ...this.stats$.getValue(), ...update });
  }
}

/**
 * An update that would only rewrite the remote data info the schedule already has
 */
function isNoOpEdit(edits: ScheduleEdits, existing: Schedule): boolean {
  return Object.keys(edits).length === 1 && deepEqual(edits.remoteDataInfo, existing.remoteDataInfo);
}

/**
 * Create a remote data sync engine
 */
export function createRemoteDataSyncEngine(config: RemoteDataSyncConfig): RemoteDataSyncEngine {
  return new RemoteDataSyncEngine(config);
}
