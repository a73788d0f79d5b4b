import {
  InAppError,
  type RemoteDataInfo,
  type RemoteDataMetadata,
  type RemoteDataSource,
} from '@inapp/core';
import { Subject, type Observable } from 'rxjs';
import type { RemoteDataChange, RemoteDataPayload, RemoteDataProvider } from './types.js';

export interface PublishOptions {
  /** Explicit version; defaults to the previous version + 1 */
  version?: number;
  lastModified?: string;
  contactId?: string;
  /** Emit a change notification (default: true) */
  notify?: boolean;
}

/**
 * Remote data provider that serves payloads held in memory.
 *
 * @example
 * ```typescript
 * const provider = new MemoryRemoteDataProvider();
 * provider.publish('app', { in_app_messages: [...] });
 *
 * const engine = new RemoteDataSyncEngine({ provider, delegate, preferences });
 * engine.subscribe();
 * ```
 */
export class MemoryRemoteDataProvider implements RemoteDataProvider {
  private readonly payloads = new Map<RemoteDataSource, RemoteDataPayload>();
  private readonly failures = new Map<RemoteDataSource, Error[]>();
  private readonly fetchCounts = new Map<RemoteDataSource, number>();
  private readonly outdated: RemoteDataInfo[] = [];
  private readonly changes$ = new Subject<RemoteDataChange>();

  changes(): Observable<RemoteDataChange> {
    return this.changes$.asObservable();
  }

  async fetch(source: RemoteDataSource): Promise<RemoteDataPayload> {
    this.fetchCounts.set(source, this.getFetchCount(source) + 1);

    const failure = this.failures.get(source)?.shift();
    if (failure) {
      throw failure;
    }

    const payload = this.payloads.get(source);
    if (!payload) {
      return { source, metadata: { source, version: 0 }, data: {} };
    }
    return structuredClone(payload);
  }

  notifyOutdated(info: RemoteDataInfo): void {
    this.outdated.push(structuredClone(info));
  }

  /**
   * Replace the payload of a source and, by default, announce the change
   */
  publish(source: RemoteDataSource, data: unknown, options: PublishOptions = {}): RemoteDataMetadata {
    const previous = this.payloads.get(source);
    const metadata: RemoteDataMetadata = {
      source,
      version: options.version ?? (previous?.metadata.version ?? 0) + 1,
      ...(options.lastModified !== undefined ? { lastModified: options.lastModified } : {}),
    };

    this.payloads.set(source, {
      source,
      metadata,
      data: structuredClone(data),
      ...(options.contactId !== undefined ? { contactId: options.contactId } : {}),
    });

    if (options.notify ?? true) {
      this.changes$.next({ source });
    }
    return metadata;
  }

  /**
   * Emit a change notification without replacing the payload
   */
  notifyChanged(source: RemoteDataSource): void {
    this.changes$.next({ source });
  }

  /**
   * Make the next fetch of `source` reject
   */
  failNextFetch(source: RemoteDataSource, error?: Error): void {
    const queue = this.failures.get(source) ?? [];
    queue.push(
      error ?? new InAppError({ code: 'INAPP_R100', message: 'Simulated fetch failure', context: { source } })
    );
    this.failures.set(source, queue);
  }

  getFetchCount(source: RemoteDataSource): number {
    return this.fetchCounts.get(source) ?? 0;
  }

  /**
   * Remote data info passed to {@link notifyOutdated}, oldest first
   */
  getOutdatedNotifications(): RemoteDataInfo[] {
    return [...this.outdated];
  }

  destroy(): void {
    this.changes$.complete();
  }
}

/**
 * Create an in-memory remote data provider
 */
export function createMemoryRemoteDataProvider(): MemoryRemoteDataProvider {
  return new MemoryRemoteDataProvider();
}
