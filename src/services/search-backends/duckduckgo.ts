import { BrowserSearchEngine, type EngineOptions } from './base.js';
import type { ExtractionRules } from '../result-extractor.js';

const SEARCH_URL = 'https://duckduckgo.com/html/';
const RESULTS_PER_PAGE = 10;

export const DUCKDUCKGO_RULES: ExtractionRules = {
  container: 'div.results',
  item: 'div.result',
  title: 'a.result__a',
  link: 'a.result__a',
  snippet: '.result__snippet',
  exclude: '.result--ad',
  empty: '.no-results',
};

/**
 * Unwraps DuckDuckGo's `/l/?uddg=<target>` click-through links.
 * Anything else is returned unchanged.
 */
export function cleanDuckDuckGoUrl(url: string): string {
  if (!url) return '';

  const absolute = url.startsWith('//duckduckgo.com/l/') ? `https:${url}` : url;
  if (!absolute.includes('duckduckgo.com/l/')) return url;

  try {
    return new URL(absolute).searchParams.get('uddg') ?? url;
  } catch {
    return url;
  }
}

export class DuckDuckGoSearchEngine extends BrowserSearchEngine {
  constructor(options?: EngineOptions) {
    super(
      {
        name: 'duckduckgo',
        readySelector: 'div.results, .no-results',
        consentSelectors: [],
        rules: DUCKDUCKGO_RULES,
      },
      options,
    );
  }

  buildTarget(query: string, page: number): URL {
    this.assertPage(page);
    const offset = (page - 1) * RESULTS_PER_PAGE;
    const url = new URL(SEARCH_URL);
    url.searchParams.set('q', query);
    url.searchParams.set('s', String(offset));
    url.searchParams.set('o', 'json');
    url.searchParams.set('dc', String(offset + 1));
    url.searchParams.set('api', 'd.js');
    return url;
  }

  protected cleanLink(href: string): string {
    return cleanDuckDuckGoUrl(href);
  }
}
