import type { BrowserSession } from './browser.js';
import type { EngineRegistry } from './engine-registry.js';
import type { SessionPool } from './session-pool.js';
import { createSearchResponse, type SearchHit, type SearchResponse } from '../types/search.js';
import { InvalidInputError, InvalidPageError, SearchCancelledError, isSearchError } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';

const log = createLogger('search');

/**
 * Per-engine adapter. Adapters hold no state between calls and never retry;
 * everything they touch comes in through the borrowed session.
 */
export interface SearchEngine {
  readonly name: string;
  /** Results-page URL for a 1-based page. Throws InvalidPageError when page < 1. */
  buildTarget(query: string, page: number): URL;
  /** Loads `target`, clears consent dialogs and waits for the page to be ready. */
  navigate(session: BrowserSession, target: URL): Promise<void>;
  /** Reads hits from the loaded page in document order. */
  extract(session: BrowserSession): Promise<SearchHit[]>;
}

export interface SearchServiceOptions {
  acquireTimeoutMs: number;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new SearchCancelledError({ cause: signal.reason }));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export class SearchService {
  private registry: EngineRegistry;
  private pool: SessionPool;
  private acquireTimeoutMs: number;

  constructor(registry: EngineRegistry, pool: SessionPool, options: SearchServiceOptions) {
    this.registry = registry;
    this.pool = pool;
    this.acquireTimeoutMs = options.acquireTimeoutMs;
  }

  listEngines(): string[] {
    return this.registry.list();
  }

  async search(engineName: string, query: string, page: number, options?: SearchOptions): Promise<SearchResponse> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new InvalidInputError('Query must not be empty');
    }
    if (!Number.isInteger(page) || page < 1) {
      throw new InvalidPageError(page);
    }

    const engine = this.registry.resolve(engineName);
    const target = engine.buildTarget(trimmed, page);
    const signal = options?.signal;

    log.info('Searching', { engine: engineName, query: trimmed, page });
    const start = Date.now();
    const session = await this.pool.acquire(this.acquireTimeoutMs, signal);

    let healthy = false;
    try {
      await abortable(engine.navigate(session, target), signal);
      const hits = await abortable(engine.extract(session), signal);
      healthy = true;
      log.info('Search complete', {
        engine: engineName,
        query: trimmed,
        page,
        resultsFound: hits.length,
        durationMs: Date.now() - start,
      });
      return createSearchResponse(engineName, hits, page);
    } catch (error) {
      log.error('Search failed', {
        engine: engineName,
        query: trimmed,
        page,
        kind: isSearchError(error) ? error.kind : 'Unexpected',
        error: errorMessage(error),
        durationMs: Date.now() - start,
      });
      throw error;
    } finally {
      this.pool.release(session, healthy);
    }
  }
}
