import { InAppError, type RemoteDataSource } from '@inapp/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDeferred, type Deferred } from './__tests__/deferred.js';
import { RefreshCoordinator } from './refresh-coordinator.js';
import type { RefreshOutcome } from './types.js';

function settled(source: RemoteDataSource, version: number): RefreshOutcome {
  return { status: 'settled', source, metadata: { source, version } };
}

/**
 * Cycle stub whose runs are resolved by the test, one deferred per call
 */
function controlledCycle() {
  const runs: { source: RemoteDataSource; deferred: Deferred<RefreshOutcome> }[] = [];
  const cycle = vi.fn((source: RemoteDataSource) => {
    const deferred = createDeferred<RefreshOutcome>();
    runs.push({ source, deferred });
    return deferred.promise;
  });
  return { cycle, runs };
}

describe('RefreshCoordinator', () => {
  let control: ReturnType<typeof controlledCycle>;
  let coordinator: RefreshCoordinator;

  beforeEach(() => {
    control = controlledCycle();
    coordinator = new RefreshCoordinator(control.cycle);
  });

  afterEach(() => {
    coordinator.destroy();
  });

  it('should start idle', () => {
    expect(coordinator.getState('app')).toEqual({ status: 'idle' });
    expect(coordinator.isInFlight('app')).toBe(false);
    expect(coordinator.awaitInFlight('app')).toBeNull();
  });

  it('should issue exactly one fetch for concurrent refreshes of a source', async () => {
    const waiters = Array.from({ length: 5 }, () => coordinator.refresh('app'));

    expect(control.cycle).toHaveBeenCalledTimes(1);
    expect(coordinator.getState('app')).toEqual({ status: 'in-flight' });

    control.runs[0]!.deferred.resolve(settled('app', 3));
    const outcomes = await Promise.all(waiters);

    expect(outcomes).toEqual(Array.from({ length: 5 }, () => settled('app', 3)));
    expect(control.cycle).toHaveBeenCalledTimes(1);
    expect(coordinator.getState('app')).toEqual({
      status: 'settled',
      metadata: { source: 'app', version: 3 },
    });
  });

  it('should run different sources independently', async () => {
    const app = coordinator.refresh('app');
    const contact = coordinator.refresh('contact');

    expect(control.runs.map((r) => r.source)).toEqual(['app', 'contact']);

    control.runs[1]!.deferred.resolve(settled('contact', 1));
    await expect(contact).resolves.toEqual(settled('contact', 1));
    expect(coordinator.isInFlight('app')).toBe(true);

    control.runs[0]!.deferred.resolve(settled('app', 1));
    await expect(app).resolves.toEqual(settled('app', 1));
  });

  it('should start a new fetch once the previous one settled', async () => {
    const first = coordinator.refresh('app');
    control.runs[0]!.deferred.resolve(settled('app', 1));
    await first;

    const second = coordinator.refresh('app');
    expect(control.cycle).toHaveBeenCalledTimes(2);
    control.runs[1]!.deferred.resolve(settled('app', 2));
    await expect(second).resolves.toEqual(settled('app', 2));
  });

  it('should return to idle after a failed cycle', async () => {
    const error = InAppError.fromCode('INAPP_R100', { source: 'app' });
    const refresh = coordinator.refresh('app');

    control.runs[0]!.deferred.resolve({ status: 'failed', source: 'app', error });

    await expect(refresh).resolves.toEqual({ status: 'failed', source: 'app', error });
    expect(coordinator.getState('app')).toEqual({ status: 'idle' });
    expect(control.cycle).toHaveBeenCalledTimes(1);
  });

  it('should turn a rejected cycle into a failed outcome', async () => {
    const refresh = coordinator.refresh('app');

    control.runs[0]!.deferred.reject(new Error('socket closed'));
    const outcome = await refresh;

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.error.code).toBe('INAPP_R100');
      expect(outcome.error.message).toBe('socket closed');
      expect(outcome.error.context).toEqual({ source: 'app' });
    }
  });

  it('should keep the newer metadata after a stale outcome', async () => {
    const refresh = coordinator.refresh('app');

    control.runs[0]!.deferred.resolve({
      status: 'stale',
      source: 'app',
      current: { source: 'app', version: 9 },
    });
    await refresh;

    expect(coordinator.getState('app')).toEqual({
      status: 'settled',
      metadata: { source: 'app', version: 9 },
    });
  });

  it('should queue one follow-up for changes that arrive mid-flight', async () => {
    const outcomes: RefreshOutcome[] = [];
    coordinator.settled().subscribe((outcome) => outcomes.push(outcome));

    coordinator.notifyChanged('app');
    coordinator.notifyChanged('app');
    coordinator.notifyChanged('app');
    expect(control.cycle).toHaveBeenCalledTimes(1);

    const followUp = coordinator.awaitNextSettle('app');
    control.runs[0]!.deferred.resolve(settled('app', 1));
    await expect(followUp).resolves.toEqual(settled('app', 1));

    expect(control.cycle).toHaveBeenCalledTimes(2);
    expect(coordinator.isInFlight('app')).toBe(true);

    control.runs[1]!.deferred.resolve(settled('app', 2));
    await coordinator.awaitInFlight('app');

    expect(control.cycle).toHaveBeenCalledTimes(2);
    expect(outcomes).toEqual([settled('app', 1), settled('app', 2)]);
  });

  it('should let a waiter join the queued follow-up', async () => {
    coordinator.notifyChanged('app');
    coordinator.notifyChanged('app');

    control.runs[0]!.deferred.resolve(settled('app', 1));
    await coordinator.awaitNextSettle('app');

    const joined = coordinator.refresh('app');
    expect(control.cycle).toHaveBeenCalledTimes(2);

    control.runs[1]!.deferred.resolve(settled('app', 2));
    await expect(joined).resolves.toEqual(settled('app', 2));
  });

  it('should wait for the next settle of the right source only', async () => {
    const next = coordinator.awaitNextSettle('app');
    const contact = coordinator.refresh('contact');
    const app = coordinator.refresh('app');

    control.runs[0]!.deferred.resolve(settled('contact', 4));
    await contact;
    control.runs[1]!.deferred.resolve(settled('app', 5));
    await app;

    await expect(next).resolves.toEqual(settled('app', 5));
  });

  it('should release waiters with an abandoned outcome', async () => {
    const refresh = coordinator.refresh('app');
    const next = coordinator.awaitNextSettle('app');

    coordinator.abandonAll();

    await expect(refresh).resolves.toEqual({ status: 'abandoned', source: 'app' });
    await expect(next).resolves.toEqual({ status: 'abandoned', source: 'app' });
    expect(coordinator.getState('app')).toEqual({ status: 'idle' });
    expect(coordinator.isInFlight('app')).toBe(false);
  });

  it('should ignore cycles that finish after being abandoned', async () => {
    const outcomes: RefreshOutcome[] = [];
    coordinator.settled().subscribe((outcome) => outcomes.push(outcome));

    void coordinator.refresh('app');
    coordinator.abandonAll();

    const fresh = coordinator.refresh('app');
    expect(coordinator.isInFlight('app')).toBe(true);

    control.runs[0]!.deferred.resolve(settled('app', 1));
    await vi.waitFor(() => expect(control.cycle).toHaveBeenCalledTimes(2));
    expect(coordinator.isInFlight('app')).toBe(true);

    control.runs[1]!.deferred.resolve(settled('app', 2));
    await expect(fresh).resolves.toEqual(settled('app', 2));
    expect(outcomes).toEqual([settled('app', 2)]);
  });

  it('should hold the next cycle until the abandoned one finishes', async () => {
    void coordinator.refresh('app');
    coordinator.abandonAll();

    coordinator.notifyChanged('app');
    const joined = coordinator.refresh('app');
    await Promise.resolve();

    expect(control.cycle).toHaveBeenCalledTimes(1);
    expect(coordinator.getState('app')).toEqual({ status: 'in-flight' });

    control.runs[0]!.deferred.resolve(settled('app', 1));
    await vi.waitFor(() => expect(control.cycle).toHaveBeenCalledTimes(2));
    control.runs[1]!.deferred.resolve(settled('app', 2));

    await expect(joined).resolves.toEqual(settled('app', 2));
    expect(control.cycle).toHaveBeenCalledTimes(2);
  });

  it('should not hold cycles of other sources behind an abandoned one', () => {
    void coordinator.refresh('app');
    coordinator.abandonAll();

    void coordinator.refresh('contact');

    expect(control.cycle).toHaveBeenCalledTimes(2);
    expect(control.runs[1]!.source).toBe('contact');
  });

  it('should make a settled source idle on invalidate', async () => {
    const refresh = coordinator.refresh('app');
    control.runs[0]!.deferred.resolve(settled('app', 1));
    await refresh;

    coordinator.invalidate('app');

    expect(coordinator.getState('app')).toEqual({ status: 'idle' });
  });

  it('should resolve pending next-settle waiters when destroyed', async () => {
    const next = coordinator.awaitNextSettle('app');

    coordinator.destroy();

    await expect(next).resolves.toEqual({ status: 'abandoned', source: 'app' });
  });
});
