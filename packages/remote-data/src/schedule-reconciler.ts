import {
  SCHEDULE_FIELD_NAMES,
  type RemoteDataInfo,
  type Schedule,
  type ScheduleDraft,
  type ScheduleEdits,
} from '@inapp/core';
import { meetsMinSdkVersion } from './sdk-version.js';
import type { SchedulePayload } from './types.js';

export interface ReconcileInput {
  /** Identifiers of schedules currently attributed to the payload's source */
  previousScheduleIds: ReadonlySet<string>;
  /** Current local schedules, used to limit edits to changed fields */
  previousSchedules?: ReadonlyMap<string, Schedule>;
  payload: SchedulePayload;
  /** New-user cutoff of this install (Unix ms) */
  cutoffTime: number;
  /** Evaluation instant (Unix ms) */
  now: number;
  /** Running SDK version; drafts requiring a newer one are treated as absent */
  sdkVersion?: string;
}

export interface ScheduleUpdate {
  id: string;
  edits: ScheduleEdits;
}

export type SkipReason = 'ended' | 'new-user' | 'sdk-version' | 'duplicate';

export interface SkippedDraft {
  id: string;
  reason: SkipReason;
}

/**
 * Changes needed to bring local schedules in line with a payload.
 * Apply creates, then updates, then deletes.
 */
export interface ReconcileResult {
  toCreate: Schedule[];
  toUpdate: ScheduleUpdate[];
  toDelete: string[];
  /** Drafts present in the payload but treated as absent */
  skipped: SkippedDraft[];
}

/**
 * Compute the create/update/delete diff between the schedules known for a
 * source and that source's latest payload.
 *
 * A draft is treated as absent when:
 * - its `end` is at or before `now`
 * - it targets new users and `now` is not before the install's cutoff
 * - it requires a newer SDK than `sdkVersion`
 *
 * Pure: identical inputs always give an identical result.
 *
 * @example
 * ```typescript
 * const diff = reconcile({
 *   previousScheduleIds: new Set(['welcome']),
 *   payload,
 *   cutoffTime: policy.resolve(false),
 *   now: Date.now(),
 * });
 * ```
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
  const { previousScheduleIds, previousSchedules, payload, cutoffTime, now, sdkVersion } = input;

  const remoteDataInfo: RemoteDataInfo = {
    source: payload.source,
    metadata: { ...payload.metadata },
    ...(payload.contactId !== undefined ? { contactId: payload.contactId } : {}),
  };

  const toCreate: Schedule[] = [];
  const toUpdate: ScheduleUpdate[] = [];
  const skipped: SkippedDraft[] = [];
  const eligible = new Set<string>();
  const seen = new Set<string>();

  for (const draft of payload.drafts) {
    if (seen.has(draft.id)) {
      skipped.push({ id: draft.id, reason: 'duplicate' });
      continue;
    }
    seen.add(draft.id);

    const reason = skipReason(draft, cutoffTime, now, sdkVersion);
    if (reason) {
      skipped.push({ id: draft.id, reason });
      continue;
    }

    eligible.add(draft.id);

    if (previousScheduleIds.has(draft.id)) {
      toUpdate.push({
        id: draft.id,
        edits: computeEdits(draft, previousSchedules?.get(draft.id), remoteDataInfo),
      });
    } else {
      toCreate.push({ ...draft, remoteDataInfo: cloneInfo(remoteDataInfo) });
    }
  }

  const toDelete = Array.from(previousScheduleIds)
    .filter((id) => !eligible.has(id))
    .sort();

  return { toCreate, toUpdate, toDelete, skipped };
}

function skipReason(
  draft: ScheduleDraft,
  cutoffTime: number,
  now: number,
  sdkVersion: string | undefined
): SkipReason | null {
  if (draft.end !== undefined && draft.end <= now) {
    return 'ended';
  }

  if (draft.newUserOnly && !(now < cutoffTime)) {
    return 'new-user';
  }

  if (sdkVersion !== undefined && !meetsMinSdkVersion(sdkVersion, draft.minSdkVersion)) {
    return 'sdk-version';
  }

  return null;
}

function computeEdits(
  draft: ScheduleDraft,
  previous: Schedule | undefined,
  remoteDataInfo: RemoteDataInfo
): ScheduleEdits {
  const edits: ScheduleEdits = { remoteDataInfo: cloneInfo(remoteDataInfo) };

  for (const field of SCHEDULE_FIELD_NAMES) {
    if (!previous || !deepEqual(previous[field], draft[field])) {
      Object.assign(edits, { [field]: draft[field] });
    }
  }

  return edits;
}

function cloneInfo(info: RemoteDataInfo): RemoteDataInfo {
  return { ...info, metadata: { ...info.metadata } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural equality for JSON-like values
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, index) => deepEqual(item, b[index]));
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key]));
  }

  return false;
}
