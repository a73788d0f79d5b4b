/**
 * End-to-end reconcile flows through the sync engine, the in-memory
 * provider and an in-memory scheduler
 */
import { MemoryPreferenceStore } from '@inapp/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DISTANT_PAST } from '../cutoff-policy.js';
import { RemoteDataSyncEngine } from '../sync-engine.js';
import { MemoryRemoteDataProvider } from '../transport/memory.js';
import type { RemoteDataPayload } from '../transport/types.js';
import { createDeferred } from './deferred.js';
import { InMemoryScheduleDelegate } from './test-delegate.js';

const NOW = Date.UTC(2024, 5, 1);

describe('remote data sync flow', () => {
  let provider: MemoryRemoteDataProvider;
  let delegate: InMemoryScheduleDelegate;
  let preferences: MemoryPreferenceStore;
  let engine: RemoteDataSyncEngine;

  beforeEach(() => {
    provider = new MemoryRemoteDataProvider();
    delegate = new InMemoryScheduleDelegate();
    preferences = new MemoryPreferenceStore();
    engine = new RemoteDataSyncEngine({
      provider,
      delegate,
      preferences,
      logger: false,
      now: () => NOW,
    });
  });

  afterEach(() => {
    engine.destroy();
    provider.destroy();
  });

  async function sync(data: unknown, options: { version?: number } = {}): Promise<void> {
    provider.publish('app', data, options);
    if (!engine.isSubscribed) engine.subscribe();
    await engine.refreshSource('app');
  }

  it('should update kept schedules and create new ones', async () => {
    await sync({ in_app_messages: [{ message: { message_id: 'X', title: 'First' } }] });
    const editSchedule = vi.spyOn(delegate, 'editSchedule');
    const scheduleMultiple = vi.spyOn(delegate, 'scheduleMultiple');
    const cancelSchedules = vi.spyOn(delegate, 'cancelSchedules');

    await sync({
      in_app_messages: [
        { message: { message_id: 'X', title: 'Second' }, priority: 2 },
        { message: { message_id: 'Y' } },
      ],
    });

    const v2 = { source: 'app', metadata: { source: 'app', version: 2 } };
    expect(editSchedule).toHaveBeenCalledTimes(1);
    expect(editSchedule).toHaveBeenCalledWith('X', {
      remoteDataInfo: v2,
      content: { message_id: 'X', title: 'Second' },
      priority: 2,
    });
    expect(scheduleMultiple).toHaveBeenCalledWith([
      { id: 'Y', content: { message_id: 'Y' }, remoteDataInfo: v2 },
    ]);
    expect(cancelSchedules).not.toHaveBeenCalled();
    expect(Array.from(delegate.schedules.keys()).sort()).toEqual(['X', 'Y']);
  });

  it('should delete schedules missing from the payload', async () => {
    await sync({ in_app_messages: [{ message: { message_id: 'X' } }, { message: { message_id: 'Z' } }] });
    const editSchedule = vi.spyOn(delegate, 'editSchedule');
    const cancelSchedules = vi.spyOn(delegate, 'cancelSchedules');

    await sync({ in_app_messages: [{ message: { message_id: 'X' } }] });

    expect(editSchedule).toHaveBeenCalledWith('X', {
      remoteDataInfo: { source: 'app', metadata: { source: 'app', version: 2 } },
    });
    expect(cancelSchedules).toHaveBeenCalledWith(['Z']);
    expect(Array.from(delegate.schedules.keys())).toEqual(['X']);
  });

  it('should not create schedules that already ended', async () => {
    await sync({
      in_app_messages: [
        { message: { message_id: 'current' }, end: '2024-07-01T00:00:00Z' },
        { message: { message_id: 'ended' }, end: '2024-05-01T00:00:00Z' },
      ],
    });

    expect(Array.from(delegate.schedules.keys())).toEqual(['current']);
    expect(delegate.get('current')?.end).toBe(Date.UTC(2024, 6, 1));
  });

  it('should delete a held schedule once it ended', async () => {
    await sync({ in_app_messages: [{ message: { message_id: 'sale' } }] });

    await sync({ in_app_messages: [{ message: { message_id: 'sale' }, end: '2024-05-31T23:59:59Z' }] });

    expect(delegate.get('sale')).toBeUndefined();
  });

  describe('new user messages', () => {
    const messages = {
      in_app_messages: [
        { message: { message_id: 'onboarding' }, audience: { new_user: true }, created: '2024-05-01T00:00:00Z' },
        { message: { message_id: 'later' }, audience: { new_user: true }, created: '2024-07-01T00:00:00Z' },
        { message: { message_id: 'everyone' }, created: '2024-05-01T00:00:00Z' },
      ],
    };

    it('should show them while the install cutoff is ahead', async () => {
      const cutoff = NOW + 86_400_000;
      preferences.setItem('inapp_remote_data.new_user_cutoff', String(cutoff));

      await sync(messages);

      expect(engine.newUserCutOffTime).toBe(cutoff);
      expect(Array.from(delegate.schedules.keys())).toEqual(['onboarding', 'later', 'everyone']);
    });

    it('should hide them once the install cutoff is reached', async () => {
      await sync(messages);

      expect(engine.newUserCutOffTime).toBe(NOW);
      expect(Array.from(delegate.schedules.keys())).toEqual(['everyone']);
    });

    it('should hide them from installs that predate the cutoff', async () => {
      preferences.setItem(
        'inapp_remote_data.versions',
        JSON.stringify({
          app: { metadata: { source: 'app', version: 1 }, scheduleIds: [], committedAt: 0 },
        })
      );

      await sync(messages, { version: 2 });

      expect(engine.newUserCutOffTime).toBe(DISTANT_PAST);
      expect(Array.from(delegate.schedules.keys())).toEqual(['everyone']);
    });
  });

  it('should keep the newer version when an older payload arrives late', async () => {
    await sync({ in_app_messages: [{ message: { message_id: 'X' } }] }, { version: 2 });

    provider.publish('app', { in_app_messages: [] }, { version: 1 });
    const outcome = await engine.refreshSource('app');

    expect(outcome).toEqual({
      status: 'stale',
      source: 'app',
      current: { source: 'app', version: 2 },
    });
    expect(delegate.get('X')).toBeDefined();
    expect(engine.isScheduleUpToDate({
      id: 'X',
      content: { message_id: 'X' },
      remoteDataInfo: { source: 'app', metadata: { source: 'app', version: 2 } },
    })).toBe(true);
  });

  it('should not overlap fetches when subscribing again during a fetch', async () => {
    provider.publish('app', { in_app_messages: [{ message: { message_id: 'X' } }] });
    const gate = createDeferred<void>();
    const serve = provider.fetch.bind(provider);
    let running = 0;
    let maxRunning = 0;
    const fetch = vi.spyOn(provider, 'fetch').mockImplementation(async (source) => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      try {
        await gate.promise;
        return await serve(source);
      } finally {
        running--;
      }
    });

    engine.subscribe();
    engine.unsubscribe();
    engine.subscribe();
    const refreshed = engine.refreshSource('app');
    expect(fetch).toHaveBeenCalledTimes(1);

    gate.resolve();

    await expect(refreshed).resolves.toEqual({
      status: 'settled',
      source: 'app',
      metadata: { source: 'app', version: 1 },
    });
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(maxRunning).toBe(1);
    expect(Array.from(delegate.schedules.keys())).toEqual(['X']);
  });

  it('should release full refresh waiters on unsubscribe', async () => {
    const pending = createDeferred<RemoteDataPayload>();
    vi.spyOn(provider, 'fetch').mockImplementationOnce(() => pending.promise);
    const getSchedules = vi.spyOn(delegate, 'getSchedules');

    engine.subscribe();
    const waiting = engine.waitFullRefresh({
      id: 'X',
      content: { message_id: 'X' },
      remoteDataInfo: { source: 'app', metadata: { source: 'app', version: 1 } },
    });
    engine.unsubscribe();

    await expect(waiting).resolves.toBe(false);

    pending.resolve({
      source: 'app',
      metadata: { source: 'app', version: 1 },
      data: { in_app_messages: [{ message: { message_id: 'X' } }] },
    });
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(getSchedules).not.toHaveBeenCalled();
    expect(delegate.schedules.size).toBe(0);
    expect(engine.isSubscribed).toBe(false);
  });
});
