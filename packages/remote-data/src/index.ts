/**
 * @inapp/remote-data - Remote data sync for scheduled in-app messages
 *
 * Keeps the schedules held by a local scheduler in line with remote data
 * payloads, one source at a time.
 *
 * ## Architecture
 *
 * ```
 *             ┌───────────────────────────────┐
 *             │      RemoteDataProvider       │
 *             │ (changes, fetch, outdated)    │
 *             └───────────────┬───────────────┘
 *                             │
 *                             ▼
 * ┌─────────────────────────────────────────────────────────┐
 * │                  RemoteDataSyncEngine                   │
 * │                                                         │
 * │  ┌────────────────────┐      ┌───────────────────────┐  │
 * │  │ RefreshCoordinator │ ───► │ fetch → parse →       │  │
 * │  │ (one cycle/source) │      │ reconcile → apply →   │  │
 * │  └────────────────────┘      │ commit                │  │
 * │                              └───────────────────────┘  │
 * │  ┌──────────────┐  ┌──────────────┐  ┌───────────────┐  │
 * │  │ VersionStore │  │ CutoffPolicy │  │ Staleness     │  │
 * │  │ (versions)   │  │ (new users)  │  │ Tracker       │  │
 * │  └──────────────┘  └──────────────┘  └───────────────┘  │
 * └────────────────────────────┬────────────────────────────┘
 *                              │
 *                              ▼
 *             ┌───────────────────────────────┐
 *             │       ScheduleDelegate        │
 *             │   (the owning scheduler)      │
 *             └───────────────────────────────┘
 * ```
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createFilePreferenceStore } from '@inapp/core';
 * import { createRemoteDataSyncEngine } from '@inapp/remote-data';
 *
 * const engine = createRemoteDataSyncEngine({
 *   provider,
 *   delegate: scheduler,
 *   preferences: createFilePreferenceStore('./data/preferences.json'),
 *   sources: ['app', 'contact'],
 *   sdkVersion: '17.2.0',
 * });
 *
 * engine.subscribe();
 *
 * engine.getStatus().subscribe((status) => {
 *   console.log('Sync status:', status);
 * });
 *
 * if (await engine.waitFullRefresh(schedule)) {
 *   display(schedule);
 * }
 * ```
 *
 * ## Refresh modes
 *
 * | Method | Fetches | Resolves |
 * |--------|---------|----------|
 * | `isScheduleUpToDate` | never | immediately |
 * | `bestEffortRefresh` | at most once, shared | after one cycle |
 * | `waitFullRefresh` | until current | when current, failed, removed or unsubscribed |
 *
 * @packageDocumentation
 * @module @inapp/remote-data
 *
 * @see {@link RemoteDataSyncEngine} for the engine
 * @see {@link reconcile} for the diff computation
 */

// Engine
export {
  RemoteDataSyncEngine,
  createRemoteDataSyncEngine,
  type RemoteDataSyncConfig,
  type RemoteDataSyncStats,
  type RemoteDataSyncStatus,
} from './sync-engine.js';

// Coordination
export {
  RefreshCoordinator,
  type RefreshCoordinatorOptions,
  type RefreshCycle,
} from './refresh-coordinator.js';

// Reconcile
export {
  deepEqual,
  reconcile,
  type ReconcileInput,
  type ReconcileResult,
  type ScheduleUpdate,
  type SkipReason,
  type SkippedDraft,
} from './schedule-reconciler.js';
export { compareSdkVersions, meetsMinSdkVersion } from './sdk-version.js';

// State
export { VersionStore, type CommitResult, type VersionRecord, type VersionStoreOptions } from './version-store.js';
export { CutoffPolicy, DISTANT_PAST, type CutoffPolicyOptions } from './cutoff-policy.js';
export { StalenessTracker } from './staleness-tracker.js';

// Payloads
export {
  parseRemotePayload,
  type InAppMessageEntry,
  type InvalidEntry,
  type ParsedRemotePayload,
} from './payload-parser.js';

// Collaborators
export type { ScheduleDelegate } from './delegate.js';
export * from './transport/index.js';

// Types
export type { RefreshOutcome, SchedulePayload, SourceRefreshState } from './types.js';

// Logger
export {
  consoleLogHandler,
  createLogger,
  noopLogger,
  resolveLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from './logger.js';
