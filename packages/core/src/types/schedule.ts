import type { RemoteDataInfo } from './remote-data.js';

/**
 * Fields of a schedule that a remote payload may change
 */
export interface ScheduleFields {
  /** Opaque message content, never interpreted by the sync layer */
  content: unknown;
  /** Instant the schedule becomes eligible (Unix ms) */
  start?: number;
  /** Instant after which the schedule is no longer eligible (Unix ms) */
  end?: number;
  /** Lower values are displayed first */
  priority?: number;
  /** Frequency group the schedule belongs to */
  group?: string;
  /** Only shown to installs that count as new users */
  newUserOnly?: boolean;
  /** Instant the message was created remotely (Unix ms) */
  created?: number;
  /** Instant the message was last edited remotely (Unix ms) */
  lastUpdated?: number;
  /** Lowest SDK version able to display the message */
  minSdkVersion?: string;
}

/**
 * Mutable field names, in the order edits are computed
 */
export const SCHEDULE_FIELD_NAMES = [
  'content',
  'start',
  'end',
  'priority',
  'group',
  'newUserOnly',
  'created',
  'lastUpdated',
  'minSdkVersion',
] as const satisfies readonly (keyof ScheduleFields)[];

export type ScheduleFieldName = (typeof SCHEDULE_FIELD_NAMES)[number];

/**
 * A schedule as described by a remote payload, before it is materialized
 */
export interface ScheduleDraft extends ScheduleFields {
  /** Unique schedule identifier */
  id: string;
}

/**
 * A schedule held by the local scheduler
 */
export interface Schedule extends ScheduleDraft {
  /** Provenance, or null for schedules not sourced from remote data */
  remoteDataInfo: RemoteDataInfo | null;
}

/**
 * Changes applied to an existing schedule. Remote data info is always refreshed.
 */
export type ScheduleEdits = Partial<ScheduleFields> & {
  remoteDataInfo: RemoteDataInfo;
};
