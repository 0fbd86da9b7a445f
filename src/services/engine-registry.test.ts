import { describe, it, expect } from 'vitest';
import { EngineRegistry, createDefaultRegistry } from './engine-registry.js';
import { DuckDuckGoSearchEngine } from './search-backends/duckduckgo.js';
import { BingSearchEngine } from './search-backends/bing.js';
import { UnknownEngineError } from '../errors.js';

describe('EngineRegistry', () => {
  it('lists the built-in engines in registration order', () => {
    expect(createDefaultRegistry().list()).toEqual(['duckduckgo', 'brave', 'yahoo', 'ask', 'bing']);
  });

  it('resolves a name to the same adapter every time', () => {
    const registry = createDefaultRegistry();
    const engine = registry.resolve('bing');

    expect(engine).toBeInstanceOf(BingSearchEngine);
    expect(registry.resolve('bing')).toBe(engine);
  });

  it('matches names case-sensitively', () => {
    const registry = createDefaultRegistry();

    expect(registry.resolve('duckduckgo').name).toBe('duckduckgo');
    expect(() => registry.resolve('DuckDuckGo')).toThrow(UnknownEngineError);
    expect(() => registry.resolve('google')).toThrow('Unknown engine: google');
  });

  it('hands out a copy of the name list', () => {
    const registry = createDefaultRegistry();
    const names = registry.list();
    names.pop();

    expect(registry.list()).toHaveLength(5);
  });

  it('refuses two adapters with the same name', () => {
    expect(() => new EngineRegistry([new DuckDuckGoSearchEngine(), new DuckDuckGoSearchEngine()])).toThrow(
      'Duplicate engine name: duckduckgo',
    );
  });
});
