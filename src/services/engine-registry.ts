import type { SearchEngine } from './search-engine.js';
import type { EngineOptions } from './search-backends/base.js';
import { DuckDuckGoSearchEngine } from './search-backends/duckduckgo.js';
import { BraveSearchEngine } from './search-backends/brave.js';
import { YahooSearchEngine } from './search-backends/yahoo.js';
import { AskSearchEngine } from './search-backends/ask.js';
import { BingSearchEngine } from './search-backends/bing.js';
import { UnknownEngineError } from '../errors.js';

export type SharedEngineOptions = Pick<EngineOptions, 'navigationTimeoutMs' | 'consentTimeoutMs'>;

/** Read-only name -> adapter table, fixed at construction. */
export class EngineRegistry {
  private readonly engines: ReadonlyMap<string, SearchEngine>;
  private readonly names: readonly string[];

  constructor(engines: Iterable<SearchEngine>) {
    const byName = new Map<string, SearchEngine>();
    for (const engine of engines) {
      if (byName.has(engine.name)) {
        throw new Error(`Duplicate engine name: ${engine.name}`);
      }
      byName.set(engine.name, engine);
    }
    this.engines = byName;
    this.names = Object.freeze(Array.from(byName.keys()));
  }

  list(): string[] {
    return [...this.names];
  }

  resolve(name: string): SearchEngine {
    const engine = this.engines.get(name);
    if (!engine) {
      throw new UnknownEngineError(name);
    }
    return engine;
  }
}

export function createDefaultRegistry(options?: SharedEngineOptions): EngineRegistry {
  return new EngineRegistry([
    new DuckDuckGoSearchEngine(options),
    new BraveSearchEngine(options),
    new YahooSearchEngine(options),
    new AskSearchEngine(options),
    new BingSearchEngine(options),
  ]);
}
