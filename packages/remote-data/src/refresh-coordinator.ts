import { ensureInAppError, type RemoteDataSource } from '@inapp/core';
import { Subject, filter, firstValueFrom, from, map, race, type Observable } from 'rxjs';
import { noopLogger, type Logger } from './logger.js';
import type { RefreshOutcome, SourceRefreshState } from './types.js';

/**
 * One fetch → reconcile → commit pass for a source
 */
export type RefreshCycle = (source: RemoteDataSource) => Promise<RefreshOutcome>;

export interface RefreshCoordinatorOptions {
  logger?: Logger;
}

interface SourceEntry {
  state: SourceRefreshState;
  inFlight: Promise<RefreshOutcome> | null;
  /** A change arrived while the fetch was in flight */
  requeue: boolean;
  /** Abandoned cycle still running; the next cycle starts after it */
  orphan: Promise<RefreshOutcome> | null;
}

/**
 * Guarantees at most one in-flight refresh cycle per source.
 *
 * Each source moves through:
 *
 * ```
 * idle ──refresh──► in-flight ──committed──► settled ──change──► in-flight
 *   ▲                   │
 *   └──────failed───────┘
 * ```
 *
 * Callers that ask for a refresh while a cycle is in flight join it instead
 * of starting another one. A change notification that lands mid-flight
 * schedules exactly one follow-up cycle, since the in-flight fetch may have
 * read the data before the change. Failures are not retried here.
 *
 * {@link abandonAll} releases every waiter with an `abandoned` outcome.
 * A cycle started while an abandoned one is still running waits for it,
 * so a source never has two cycles running at once.
 */
export class RefreshCoordinator {
  private readonly cycle: RefreshCycle;
  private readonly logger: Logger;
  private readonly entries = new Map<RemoteDataSource, SourceEntry>();
  private readonly settled$ = new Subject<RefreshOutcome>();
  private abandon$ = new Subject<void>();
  private generation = 0;

  constructor(cycle: RefreshCycle, options: RefreshCoordinatorOptions = {}) {
    this.cycle = cycle;
    this.logger = options.logger ?? noopLogger;
  }

  getState(source: RemoteDataSource): SourceRefreshState {
    return this.entries.get(source)?.state ?? { status: 'idle' };
  }

  isInFlight(source: RemoteDataSource): boolean {
    return Boolean(this.entries.get(source)?.inFlight);
  }

  /**
   * Join the in-flight cycle of a source, or start one
   */
  refresh(source: RemoteDataSource): Promise<RefreshOutcome> {
    const inFlight = this.entries.get(source)?.inFlight;
    if (inFlight) {
      this.logger.debug('Joining in-flight refresh', { source });
      return this.untilAbandoned(source, inFlight);
    }
    return this.untilAbandoned(source, this.start(source));
  }

  /**
   * React to a "remote data changed" notification
   */
  notifyChanged(source: RemoteDataSource): void {
    const entry = this.entries.get(source);
    if (entry?.inFlight) {
      entry.requeue = true;
      this.logger.debug('Change arrived during refresh, queued follow-up', { source });
      return;
    }
    void this.start(source);
  }

  /**
   * Outcome of the cycle currently in flight, or null when there is none
   */
  awaitInFlight(source: RemoteDataSource): Promise<RefreshOutcome> | null {
    const inFlight = this.entries.get(source)?.inFlight;
    return inFlight ? this.untilAbandoned(source, inFlight) : null;
  }

  /**
   * Outcome of the next cycle of a source to finish, whoever started it
   */
  awaitNextSettle(source: RemoteDataSource): Promise<RefreshOutcome> {
    const abandoned: RefreshOutcome = { status: 'abandoned', source };
    return firstValueFrom(
      race(
        this.settled$.pipe(filter((outcome) => outcome.source === source)),
        this.abandon$.pipe(map(() => abandoned))
      ),
      { defaultValue: abandoned }
    );
  }

  /**
   * Mark a settled source as needing a new fetch
   */
  invalidate(source: RemoteDataSource): void {
    const entry = this.entries.get(source);
    if (entry && entry.state.status === 'settled') {
      entry.state = { status: 'idle' };
    }
  }

  /**
   * Every cycle outcome, in completion order
   */
  settled(): Observable<RefreshOutcome> {
    return this.settled$.asObservable();
  }

  /**
   * Release all waiters and forget in-flight cycles. Cycles still running
   * finish in the background without touching coordinator state, and hold
   * back the next cycle of their source until they do.
   */
  abandonAll(): void {
    this.generation++;
    for (const [source, entry] of this.entries) {
      const orphan = entry.inFlight;
      if (orphan) {
        this.logger.debug('Abandoning in-flight refresh', { source, code: 'INAPP_R102' });
        entry.orphan = orphan;
        void orphan.then(() => {
          if (entry.orphan === orphan) entry.orphan = null;
        });
      }
      entry.inFlight = null;
      entry.requeue = false;
      entry.state = { status: 'idle' };
    }

    const abandon$ = this.abandon$;
    this.abandon$ = new Subject<void>();
    abandon$.next();
    abandon$.complete();
  }

  destroy(): void {
    this.abandonAll();
    this.settled$.complete();
  }

  private entry(source: RemoteDataSource): SourceEntry {
    let entry = this.entries.get(source);
    if (!entry) {
      entry = { state: { status: 'idle' }, inFlight: null, requeue: false, orphan: null };
      this.entries.set(source, entry);
    }
    return entry;
  }

  private start(source: RemoteDataSource): Promise<RefreshOutcome> {
    const entry = this.entry(source);
    const generation = this.generation;

    entry.state = { status: 'in-flight' };
    entry.requeue = false;

    const orphan = entry.orphan;
    if (orphan) {
      this.logger.debug('Waiting for abandoned refresh to finish', { source });
    }
    const cycle = orphan ? orphan.then(() => this.runCycle(source)) : this.runCycle(source);
    const run = cycle.then((outcome) => this.finish(source, generation, outcome));
    entry.inFlight = run;
    return run;
  }

  private async runCycle(source: RemoteDataSource): Promise<RefreshOutcome> {
    try {
      return await this.cycle(source);
    } catch (error) {
      return {
        status: 'failed',
        source,
        error: ensureInAppError(error, 'INAPP_R100', { source }),
      };
    }
  }

  private finish(source: RemoteDataSource, generation: number, outcome: RefreshOutcome): RefreshOutcome {
    if (generation !== this.generation) {
      this.logger.debug('Abandoned refresh finished', { source, status: outcome.status });
      return outcome;
    }

    const entry = this.entry(source);
    entry.inFlight = null;

    switch (outcome.status) {
      case 'settled':
        entry.state = { status: 'settled', metadata: outcome.metadata };
        break;
      case 'stale':
        entry.state = { status: 'settled', metadata: outcome.current };
        break;
      case 'failed':
      case 'abandoned':
        entry.state = { status: 'idle' };
        break;
    }

    this.settled$.next(outcome);

    if (entry.requeue && !entry.inFlight) {
      this.logger.debug('Running queued follow-up refresh', { source });
      void this.start(source);
    }

    return outcome;
  }

  private untilAbandoned(
    source: RemoteDataSource,
    run: Promise<RefreshOutcome>
  ): Promise<RefreshOutcome> {
    const abandoned: RefreshOutcome = { status: 'abandoned', source };
    return firstValueFrom(
      race(from(run), this.abandon$.pipe(map(() => abandoned))),
      { defaultValue: abandoned }
    );
  }
}
