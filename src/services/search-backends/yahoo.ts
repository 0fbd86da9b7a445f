import { BrowserSearchEngine, type EngineOptions } from './base.js';
import type { ExtractionRules } from '../result-extractor.js';

const SEARCH_URL = 'https://search.yahoo.com/search';
const RESULTS_PER_PAGE = 7;

export const YAHOO_RULES: ExtractionRules = {
  container: '#web',
  item: 'div.algo',
  title: 'h3',
  link: 'a',
  snippet: 'div.compText',
};

/** Pulls the target out of `r.search.yahoo.com/.../RU=<encoded>/RK=...` links. */
export function decodeYahooUrl(url: string): string {
  const match = /\/RU=([^/]+)\//.exec(url);
  if (!match) return url;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return url;
  }
}

export class YahooSearchEngine extends BrowserSearchEngine {
  constructor(options?: EngineOptions) {
    super(
      {
        name: 'yahoo',
        readySelector: '#web',
        consentSelectors: ['button.reject-all'],
        rules: YAHOO_RULES,
      },
      options,
    );
  }

  buildTarget(query: string, page: number): URL {
    this.assertPage(page);
    const url = new URL(SEARCH_URL);
    url.searchParams.set('q', query);
    url.searchParams.set('b', String((page - 1) * RESULTS_PER_PAGE + 1));
    return url;
  }

  protected cleanLink(href: string): string {
    return decodeYahooUrl(href);
  }
}
