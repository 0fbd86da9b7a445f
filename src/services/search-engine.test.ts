import { describe, it, expect, afterEach, vi } from 'vitest';
import { SearchService, type SearchEngine } from './search-engine.js';
import { EngineRegistry } from './engine-registry.js';
import { SessionPool } from './session-pool.js';
import type { BrowserSession } from './browser.js';
import { createSearchHit, type SearchHit } from '../types/search.js';
import {
  ExtractionFailedError,
  InvalidInputError,
  NavigationTimeoutError,
  PoolExhaustedError,
  SearchCancelledError,
  UnknownEngineError,
} from '../errors.js';
import { FakeSessionFactory, deferred } from '../testing/fakes.js';

class StubEngine implements SearchEngine {
  readonly name: string;
  hits: SearchHit[] = [];
  calls: string[] = [];
  navigateError: Error | null = null;
  extractError: Error | null = null;
  navigateGate: Promise<void> | null = null;

  constructor(name: string) {
    this.name = name;
  }

  buildTarget(query: string, page: number): URL {
    const url = new URL('https://stub.test/search');
    url.searchParams.set('q', query);
    url.searchParams.set('p', String(page));
    return url;
  }

  async navigate(session: BrowserSession, target: URL): Promise<void> {
    this.calls.push(`navigate ${session.id} ${target.href}`);
    if (this.navigateGate) await this.navigateGate;
    if (this.navigateError) throw this.navigateError;
  }

  async extract(session: BrowserSession): Promise<SearchHit[]> {
    this.calls.push(`extract ${session.id}`);
    if (this.extractError) throw this.extractError;
    return this.hits;
  }
}

describe('SearchService', () => {
  const pools: SessionPool[] = [];

  async function setup(options: { acquireTimeoutMs?: number } = {}) {
    const engine = new StubEngine('stub');
    const factory = new FakeSessionFactory();
    const pool = new SessionPool(factory, { size: 1, recycleBackoffMs: 5 });
    pools.push(pool);
    await pool.start();
    const service = new SearchService(new EngineRegistry([engine]), pool, {
      acquireTimeoutMs: options.acquireTimeoutMs ?? 100,
    });
    return { engine, factory, pool, service };
  }

  afterEach(async () => {
    await Promise.all(pools.splice(0).map((pool) => pool.shutdown(0)));
  });

  it('returns the adapter hits in order and echoes engine and page', async () => {
    const { engine, pool, service } = await setup();
    engine.hits = [
      createSearchHit('One', 'https://one.test/', 'first'),
      createSearchHit('Two', 'https://two.test/', ''),
      createSearchHit('Three', 'https://three.test/', 'third'),
    ];

    const response = await service.search('stub', 'typed arrays', 3);

    expect(response.engine).toBe('stub');
    expect(response.page).toBe(3);
    expect(response.results.map((hit) => hit.title)).toEqual(['One', 'Two', 'Three']);
    expect(engine.calls).toEqual([
      'navigate session-1 https://stub.test/search?q=typed+arrays&p=3',
      'extract session-1',
    ]);
    expect(pool.stats()).toMatchObject({ idle: 1, leased: 0, broken: 0 });
  });

  it('treats zero hits as a successful empty response', async () => {
    const { service, factory } = await setup();

    const response = await service.search('stub', 'nothing matches', 1);

    expect(response.results).toEqual([]);
    expect(factory.destroyed).toEqual([]);
  });

  it('trims the query before building the target', async () => {
    const { engine, service } = await setup();

    await service.search('stub', '  padded  ', 1);

    expect(engine.calls[0]).toBe('navigate session-1 https://stub.test/search?q=padded&p=1');
  });

  it.each([
    ['an empty query', '', 1],
    ['a blank query', '   ', 1],
    ['page 0', 'q', 0],
    ['a negative page', 'q', -2],
    ['a fractional page', 'q', 1.5],
  ])('rejects %s before acquiring a session', async (_label, query, page) => {
    const { engine, pool, service } = await setup();

    await expect(service.search('stub', query, page)).rejects.toBeInstanceOf(InvalidInputError);
    expect(engine.calls).toEqual([]);
    expect(pool.stats()).toEqual({ size: 1, idle: 1, leased: 0, broken: 0, waiting: 0 });
  });

  it('rejects an unknown engine without touching the pool', async () => {
    const { pool, service } = await setup();

    const error = await service.search('unknown-engine', 'q', 1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnknownEngineError);
    expect(error).toMatchObject({ engine: 'unknown-engine', kind: 'UnknownEngine' });
    expect(pool.stats()).toEqual({ size: 1, idle: 1, leased: 0, broken: 0, waiting: 0 });
  });

  it('propagates a navigation timeout and recycles the session', async () => {
    const { engine, factory, pool, service } = await setup();
    const timeout = new NavigationTimeoutError('stub', 'https://stub.test/', 50);
    engine.navigateError = timeout;

    await expect(service.search('stub', 'q', 1)).rejects.toBe(timeout);
    expect(engine.calls).toEqual(['navigate session-1 https://stub.test/search?q=q&p=1']);

    await vi.waitFor(() => expect(pool.stats().idle).toBe(1));
    expect(factory.destroyed).toEqual(['session-1']);

    engine.navigateError = null;
    await service.search('stub', 'q', 1);
    expect(engine.calls.at(-1)).toBe('extract session-2');
  });

  it('propagates an extraction failure and recycles the session', async () => {
    const { engine, factory, service } = await setup();
    engine.extractError = new ExtractionFailedError('stub', '#results');

    await expect(service.search('stub', 'q', 1)).rejects.toBeInstanceOf(ExtractionFailedError);
    await vi.waitFor(() => expect(factory.destroyed).toEqual(['session-1']));
  });

  it('recycles the session after an unexpected adapter error', async () => {
    const { engine, factory, service } = await setup();
    engine.navigateError = new Error('Target page, context or browser has been closed');

    await expect(service.search('stub', 'q', 1)).rejects.toThrow('Target page, context or browser has been closed');
    await vi.waitFor(() => expect(factory.destroyed).toEqual(['session-1']));
  });

  it('fails with PoolExhausted while every session is busy', async () => {
    const { engine, service } = await setup({ acquireTimeoutMs: 30 });
    const gate = deferred();
    engine.navigateGate = gate.promise;

    const first = service.search('stub', 'slow', 1);
    await expect(service.search('stub', 'fast', 1)).rejects.toBeInstanceOf(PoolExhaustedError);

    gate.resolve();
    await expect(first).resolves.toMatchObject({ engine: 'stub', page: 1 });
  });

  it('releases a cancelled search as unhealthy', async () => {
    const { engine, factory, pool, service } = await setup();
    engine.navigateGate = new Promise(() => undefined);
    const controller = new AbortController();

    const pending = service.search('stub', 'q', 1, { signal: controller.signal });
    await vi.waitFor(() => expect(engine.calls).toHaveLength(1));
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(SearchCancelledError);
    expect(pool.stats().leased).toBe(0);
    await vi.waitFor(() => expect(factory.destroyed).toEqual(['session-1']));
  });

  it('lists the registered engines', async () => {
    const { service } = await setup();
    expect(service.listEngines()).toEqual(['stub']);
  });
});
