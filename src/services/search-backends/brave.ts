import { BrowserSearchEngine, type EngineOptions } from './base.js';
import type { ExtractionRules } from '../result-extractor.js';

const SEARCH_URL = 'https://search.brave.com/search';

export const BRAVE_RULES: ExtractionRules = {
  container: '#results',
  item: 'div.result-content',
  title: 'div.title',
  link: 'a',
  snippet: 'div.content',
  exclude: '[data-type="ad"]',
};

export class BraveSearchEngine extends BrowserSearchEngine {
  constructor(options?: EngineOptions) {
    super(
      {
        name: 'brave',
        readySelector: '#results',
        consentSelectors: [],
        rules: BRAVE_RULES,
      },
      options,
    );
  }

  // Brave pages by result page index, starting at 0.
  buildTarget(query: string, page: number): URL {
    this.assertPage(page);
    const url = new URL(SEARCH_URL);
    url.searchParams.set('q', query);
    url.searchParams.set('offset', String(page - 1));
    return url;
  }
}
