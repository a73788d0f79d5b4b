import type {
  InAppError,
  RemoteDataMetadata,
  RemoteDataSource,
  ScheduleDraft,
} from '@inapp/core';

/**
 * A remote payload after parsing: the schedules one source currently describes
 */
export interface SchedulePayload {
  source: RemoteDataSource;
  metadata: RemoteDataMetadata;
  drafts: ScheduleDraft[];
  /** Frequency constraint configuration, passed through to the delegate untouched */
  constraints?: unknown;
  /** Contact the payload belongs to, for contact-scoped sources */
  contactId?: string;
}

/**
 * Outcome of one fetch → reconcile → commit cycle
 */
export type RefreshOutcome =
  | { status: 'settled'; source: RemoteDataSource; metadata: RemoteDataMetadata }
  | { status: 'stale'; source: RemoteDataSource; current: RemoteDataMetadata }
  | { status: 'failed'; source: RemoteDataSource; error: InAppError }
  | { status: 'abandoned'; source: RemoteDataSource };

/**
 * Lifecycle state of a source inside the refresh coordinator
 */
export type SourceRefreshState =
  | { status: 'idle' }
  | { status: 'in-flight' }
  | { status: 'settled'; metadata: RemoteDataMetadata };
