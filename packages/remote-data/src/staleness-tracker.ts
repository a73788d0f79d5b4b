import { isSameRemoteDataMetadata, type Schedule } from '@inapp/core';
import type { VersionStore } from './version-store.js';

/**
 * Answers freshness questions about a schedule by comparing its recorded
 * remote data metadata with the version store. Comparisons never modify the
 * schedule and never perform I/O.
 */
export class StalenessTracker {
  private readonly versions: VersionStore;

  constructor(versions: VersionStore) {
    this.versions = versions;
  }

  /**
   * True for schedules not sourced from remote data, otherwise true only when
   * the schedule carries the source's last processed metadata.
   */
  isUpToDate(schedule: Schedule): boolean {
    const info = schedule.remoteDataInfo;
    if (!info) return true;

    return isSameRemoteDataMetadata(info.metadata, this.versions.get(info.source));
  }

  /**
   * True when a stale remote schedule cannot be judged from local knowledge
   * because its source has never been processed. A stale schedule whose source
   * has newer processed data only needs the pending reconcile, not a fetch.
   */
  requiresRefresh(schedule: Schedule): boolean {
    const info = schedule.remoteDataInfo;
    if (!info) return false;
    if (this.isUpToDate(schedule)) return false;

    return this.versions.get(info.source) === undefined;
  }
}
