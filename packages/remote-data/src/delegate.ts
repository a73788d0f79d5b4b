import type { Schedule, ScheduleEdits } from '@inapp/core';

/**
 * Capabilities of the scheduler that owns schedule lifecycle.
 *
 * The engine holds this handle for its whole life and never hands itself
 * back. Every mutation must be idempotent for a given identifier: a cycle
 * whose commit is rejected can leave a partially applied diff that the next
 * cycle issues again.
 */
export interface ScheduleDelegate {
  /** Current schedules, the baseline of every reconcile */
  getSchedules(): Promise<Schedule[]>;

  /** Persist new schedules. Resolves false when persistence failed. */
  scheduleMultiple(schedules: Schedule[]): Promise<boolean>;

  /** Apply edits to one schedule. Resolves false when persistence failed. */
  editSchedule(id: string, edits: ScheduleEdits): Promise<boolean>;

  /** Remove schedules no longer present remotely. Resolves false when persistence failed. */
  cancelSchedules(ids: string[]): Promise<boolean>;

  /** Frequency constraint configuration from the payload, uninterpreted */
  setConstraints(data: unknown): void | Promise<void>;
}
