import { InAppError } from '@inapp/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MemoryRemoteDataProvider } from './memory.js';
import type { RemoteDataChange } from './types.js';

describe('MemoryRemoteDataProvider', () => {
  let provider: MemoryRemoteDataProvider;

  beforeEach(() => {
    provider = new MemoryRemoteDataProvider();
  });

  afterEach(() => {
    provider.destroy();
  });

  it('should serve an empty payload for an unpublished source', async () => {
    await expect(provider.fetch('app')).resolves.toEqual({
      source: 'app',
      metadata: { source: 'app', version: 0 },
      data: {},
    });
    expect(provider.getFetchCount('app')).toBe(1);
  });

  it('should bump the version on every publish and notify', async () => {
    const changes: RemoteDataChange[] = [];
    provider.changes().subscribe((change) => changes.push(change));

    provider.publish('app', { in_app_messages: [] });
    const second = provider.publish('app', { in_app_messages: [] }, { lastModified: 'etag-2' });

    expect(second).toEqual({ source: 'app', version: 2, lastModified: 'etag-2' });
    expect(changes).toEqual([{ source: 'app' }, { source: 'app' }]);
    await expect(provider.fetch('app')).resolves.toMatchObject({ metadata: second });
  });

  it('should publish silently when asked', () => {
    const changes: RemoteDataChange[] = [];
    provider.changes().subscribe((change) => changes.push(change));

    provider.publish('contact', {}, { version: 10, contactId: 'contact-1', notify: false });

    expect(changes).toEqual([]);
  });

  it('should return copies of the stored payload', async () => {
    const data = { in_app_messages: [{ id: 'a' }] };
    provider.publish('app', data);
    data.in_app_messages.push({ id: 'b' });

    const fetched = await provider.fetch('app');

    expect(fetched.data).toEqual({ in_app_messages: [{ id: 'a' }] });
  });

  it('should fail queued fetches once each', async () => {
    provider.publish('app', {});
    provider.failNextFetch('app');
    provider.failNextFetch('app', new Error('offline'));

    await expect(provider.fetch('app')).rejects.toBeInstanceOf(InAppError);
    await expect(provider.fetch('app')).rejects.toThrow('offline');
    await expect(provider.fetch('app')).resolves.toMatchObject({ source: 'app' });
    expect(provider.getFetchCount('app')).toBe(3);
  });

  it('should record outdated notifications', () => {
    const info = { source: 'app', metadata: { source: 'app', version: 1 } };

    provider.notifyOutdated(info);

    expect(provider.getOutdatedNotifications()).toEqual([info]);
  });
});
