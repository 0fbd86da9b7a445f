import { setTimeout as sleep } from 'node:timers/promises';
import type { BrowserSession, SessionFactory } from './browser.js';
import { PoolClosedError, PoolExhaustedError, SearchCancelledError } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';

const log = createLogger('pool');

export type SessionState = 'idle' | 'leased' | 'broken';

export interface PoolStats {
  size: number;
  idle: number;
  leased: number;
  broken: number;
  waiting: number;
}

export interface SessionPoolOptions {
  size: number;
  /** First delay before retrying a failed replacement launch. Doubles per attempt. */
  recycleBackoffMs?: number;
  maxRecycleBackoffMs?: number;
}

interface PoolSlot {
  readonly index: number;
  session: BrowserSession;
  state: SessionState;
  /** Browser died while leased; the lease comes back as unhealthy whatever the caller says. */
  crashed: boolean;
}

interface Waiter {
  grant(slot: PoolSlot): void;
  fail(error: Error): void;
}

/**
 * Bounded pool of browser sessions.
 *
 * Each slot moves `idle -> leased -> idle | broken`. A broken slot is torn down
 * and relaunched in the background and only becomes `idle` once the replacement
 * is up. An idle slot whose browser dies goes straight to `broken`.
 * Waiters are served first come, first served, and idle slots rotate in
 * FIFO order so one browser process does not take every request.
 */
export class SessionPool {
  private readonly factory: SessionFactory;
  private readonly size: number;
  private readonly recycleBackoffMs: number;
  private readonly maxRecycleBackoffMs: number;

  private slots: PoolSlot[] = [];
  private bySession: Map<string, PoolSlot> = new Map();
  private idle: PoolSlot[] = [];
  private waiters: Waiter[] = [];
  private recycling: Set<Promise<void>> = new Set();
  private drainListeners: Array<() => void> = [];
  private closing = new AbortController();
  private started = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(factory: SessionFactory, options: SessionPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${options.size}`);
    }
    this.factory = factory;
    this.size = options.size;
    this.recycleBackoffMs = options.recycleBackoffMs ?? 500;
    this.maxRecycleBackoffMs = options.maxRecycleBackoffMs ?? 10000;
    factory.onDisconnect((sessionId) => this.handleDisconnect(sessionId));
  }

  get closed(): boolean {
    return this.closing.signal.aborted;
  }

  async start(): Promise<void> {
    if (this.started) return;
    if (this.closed) throw new PoolClosedError();

    log.info('Starting session pool', { size: this.size });
    const start = Date.now();
    const outcomes = await Promise.allSettled(Array.from({ length: this.size }, () => this.factory.create()));

    const failure = outcomes.find((o): o is PromiseRejectedResult => o.status === 'rejected');
    if (failure) {
      const launched = outcomes.flatMap((o) => (o.status === 'fulfilled' ? [o.value] : []));
      log.error('Session pool failed to start', { error: errorMessage(failure.reason), launched: launched.length });
      await Promise.allSettled(launched.map((session) => this.factory.destroy(session)));
      throw failure.reason;
    }

    outcomes.forEach((outcome, index) => {
      if (outcome.status !== 'fulfilled') return;
      const slot: PoolSlot = { index, session: outcome.value, state: 'idle', crashed: false };
      this.slots.push(slot);
      this.bySession.set(slot.session.id, slot);
      this.idle.push(slot);
    });
    this.started = true;
    log.info('Session pool ready', { size: this.size, durationMs: Date.now() - start });
  }

  /**
   * Leases an idle session, waiting up to `timeoutMs` for one to free up.
   * Rejects with PoolExhaustedError on timeout, SearchCancelledError when
   * `signal` aborts first and PoolClosedError once shutdown has begun.
   */
  async acquire(timeoutMs: number, signal?: AbortSignal): Promise<BrowserSession> {
    if (this.closed) throw new PoolClosedError();
    if (!this.started) throw new Error('Session pool has not been started');
    if (signal?.aborted) throw new SearchCancelledError({ cause: signal.reason });

    const slot = this.idle.shift();
    if (slot) return this.lease(slot);

    log.debug('No idle session, queueing', { waiting: this.waiters.length + 1, timeoutMs });
    return new Promise<BrowserSession>((resolve, reject) => {
      const onAbort = (): void => {
        this.dropWaiter(waiter);
        waiter.fail(new SearchCancelledError({ cause: signal?.reason }));
      };
      const timer = setTimeout(() => {
        this.dropWaiter(waiter);
        log.warn('Timed out waiting for a session', { timeoutMs, waiting: this.waiters.length });
        waiter.fail(new PoolExhaustedError(timeoutMs));
      }, timeoutMs);
      const settle = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const waiter: Waiter = {
        grant: (granted) => {
          settle();
          resolve(this.lease(granted));
        },
        fail: (error) => {
          settle();
          reject(error);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Returns a leased session. Healthy sessions go straight to the next waiter;
   * unhealthy ones are marked broken and relaunched in the background.
   */
  release(session: BrowserSession, healthy: boolean): void {
    const slot = this.bySession.get(session.id);
    if (!slot || slot.state !== 'leased') {
      log.warn('Ignoring release of a session that is not leased', {
        sessionId: session.id,
        state: slot?.state ?? 'unknown',
      });
      return;
    }

    if (healthy && !slot.crashed) {
      log.debug('Session released', { sessionId: session.id, slot: slot.index });
      this.makeAvailable(slot);
    } else {
      log.warn('Session released as unhealthy, recycling', { sessionId: session.id, slot: slot.index });
      slot.state = 'broken';
      // Once closed, recycling only tears the session down.
      this.startRecycle(slot);
    }
    this.notifyDrain();
  }

  stats(): PoolStats {
    const count = (state: SessionState) => this.slots.filter((slot) => slot.state === state).length;
    return {
      size: this.slots.length,
      idle: count('idle'),
      leased: count('leased'),
      broken: count('broken'),
      waiting: this.waiters.length,
    };
  }

  /**
   * Refuses new acquires, waits up to `drainTimeoutMs` for outstanding leases,
   * then tears down every browser. Safe to call more than once.
   */
  shutdown(drainTimeoutMs: number): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.drainAndClose(drainTimeoutMs);
    }
    return this.shutdownPromise;
  }

  private async drainAndClose(drainTimeoutMs: number): Promise<void> {
    log.info('Shutting down session pool', { ...this.stats(), drainTimeoutMs });
    this.closing.abort();

    for (const waiter of this.waiters.splice(0)) {
      waiter.fail(new PoolClosedError());
    }

    const drained = await this.waitForDrain(drainTimeoutMs);
    if (!drained) {
      log.warn('Drain timeout elapsed with sessions still leased', { leased: this.stats().leased });
    }

    await Promise.all(this.recycling);

    const live = this.slots.filter((slot) => slot.state !== 'broken').map((slot) => slot.session);
    const outcomes = await Promise.allSettled(live.map((session) => this.factory.destroy(session)));
    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        log.error('Failed to destroy session during shutdown', {
          sessionId: live[i].id,
          error: errorMessage(outcome.reason),
        });
      }
    });
    await this.factory.close();
    log.info('Session pool shut down');
  }

  private handleDisconnect(sessionId: string): void {
    const slot = this.bySession.get(sessionId);
    if (!slot) return;

    if (slot.state === 'idle') {
      log.warn('Idle session crashed, recycling', { sessionId, slot: slot.index });
      this.idle = this.idle.filter((candidate) => candidate !== slot);
      slot.state = 'broken';
      this.startRecycle(slot);
    } else if (slot.state === 'leased') {
      log.warn('Leased session crashed, recycling on release', { sessionId, slot: slot.index });
      slot.crashed = true;
    }
  }

  private lease(slot: PoolSlot): BrowserSession {
    slot.state = 'leased';
    log.debug('Session leased', { sessionId: slot.session.id, slot: slot.index });
    return slot.session;
  }

  private makeAvailable(slot: PoolSlot): void {
    slot.state = 'idle';
    const waiter = this.closed ? undefined : this.waiters.shift();
    if (waiter) {
      waiter.grant(slot);
    } else {
      this.idle.push(slot);
    }
  }

  private dropWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) this.waiters.splice(index, 1);
  }

  private startRecycle(slot: PoolSlot): void {
    const task: Promise<void> = this.recycle(slot).finally(() => {
      this.recycling.delete(task);
    });
    this.recycling.add(task);
  }

  private async recycle(slot: PoolSlot): Promise<void> {
    const broken = slot.session;
    this.bySession.delete(broken.id);
    try {
      await this.factory.destroy(broken);
    } catch (error) {
      log.warn('Failed to tear down broken session', { sessionId: broken.id, error: errorMessage(error) });
    }

    let delay = this.recycleBackoffMs;
    for (let attempt = 1; !this.closed; attempt++) {
      try {
        const fresh = await this.factory.create();
        slot.session = fresh;
        slot.crashed = false;
        this.bySession.set(fresh.id, slot);
        log.info('Session recycled', { slot: slot.index, previous: broken.id, sessionId: fresh.id, attempt });
        this.makeAvailable(slot);
        return;
      } catch (error) {
        log.error('Failed to launch replacement session', {
          slot: slot.index,
          attempt,
          retryInMs: delay,
          error: errorMessage(error),
        });
        await this.pause(delay);
        delay = Math.min(delay * 2, this.maxRecycleBackoffMs);
      }
    }
  }

  private async pause(ms: number): Promise<void> {
    try {
      await sleep(ms, undefined, { signal: this.closing.signal });
    } catch (error) {
      if (!this.closed) throw error;
    }
  }

  private waitForDrain(timeoutMs: number): Promise<boolean> {
    if (this.stats().leased === 0) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.drainListeners = this.drainListeners.filter((listener) => listener !== onDrained);
        resolve(false);
      }, timeoutMs);
      const onDrained = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      this.drainListeners.push(onDrained);
    });
  }

  private notifyDrain(): void {
    if (this.drainListeners.length === 0 || this.stats().leased > 0) return;
    for (const listener of this.drainListeners.splice(0)) listener();
  }
}
