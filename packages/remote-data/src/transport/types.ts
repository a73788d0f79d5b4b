import type { RemoteDataInfo, RemoteDataMetadata, RemoteDataSource } from '@inapp/core';
import type { Observable } from 'rxjs';

/**
 * Notification that a source has new data available
 */
export interface RemoteDataChange {
  source: RemoteDataSource;
}

/**
 * Raw payload of one source, as delivered by the transport
 */
export interface RemoteDataPayload {
  source: RemoteDataSource;
  /** Freshness of `data` */
  metadata: RemoteDataMetadata;
  /** JSON document holding `in_app_messages` and `frequency_constraints` */
  data: unknown;
  /** Contact the payload belongs to, for contact-scoped sources */
  contactId?: string;
}

/**
 * Boundary to whatever fetches remote data (HTTP client, CDN cache, push
 * channel). Retry policy and authentication live behind it.
 */
export interface RemoteDataProvider {
  /** Stream of "new data is available" notifications */
  changes(): Observable<RemoteDataChange>;

  /**
   * Fetch the current payload of a source. Rejection means the fetch failed.
   */
  fetch(source: RemoteDataSource): Promise<RemoteDataPayload>;

  /**
   * Tell the transport that data behind `info` is known to be outdated, so
   * the next fetch bypasses any cache.
   */
  notifyOutdated?(info: RemoteDataInfo): void | Promise<void>;
}
