/**
 * Identifier of a remote data source (e.g. `'app'` or `'contact'`)
 */
export type RemoteDataSource = string;

/**
 * Freshness token of a remote source's last processed payload
 */
export interface RemoteDataMetadata {
  /** Source the payload came from */
  source: RemoteDataSource;
  /** Monotonically increasing version (usually the payload timestamp in Unix ms) */
  version: number;
  /** Opaque last-modified marker reported by the transport */
  lastModified?: string;
}

/**
 * Remote data provenance attached to a schedule
 */
export interface RemoteDataInfo {
  /** Source the schedule was created from */
  source: RemoteDataSource;
  /** Metadata of the payload that created or last updated the schedule */
  metadata: RemoteDataMetadata;
  /** Contact the payload belonged to, for contact-scoped sources */
  contactId?: string;
}

/**
 * Orders two metadata tokens by version.
 *
 * @returns A negative number when `a` is older, positive when newer, 0 when equal
 */
export function compareRemoteDataMetadata(a: RemoteDataMetadata, b: RemoteDataMetadata): number {
  return a.version - b.version;
}

/**
 * Exact equality of two metadata tokens
 */
export function isSameRemoteDataMetadata(
  a: RemoteDataMetadata | null | undefined,
  b: RemoteDataMetadata | null | undefined
): boolean {
  if (!a || !b) return false;
  return a.source === b.source && a.version === b.version && a.lastModified === b.lastModified;
}
