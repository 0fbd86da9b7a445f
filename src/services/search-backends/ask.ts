import { BrowserSearchEngine, type EngineOptions } from './base.js';
import type { ExtractionRules } from '../result-extractor.js';

const SEARCH_URL = 'https://www.ask.com/web';

export const ASK_RULES: ExtractionRules = {
  container: 'div.results',
  item: 'div.result',
  title: 'div.result-title',
  link: 'a.result-title-link',
  snippet: 'p.result-abstract',
};

export class AskSearchEngine extends BrowserSearchEngine {
  constructor(options?: EngineOptions) {
    super(
      {
        name: 'ask',
        readySelector: 'div.results',
        consentSelectors: [],
        rules: ASK_RULES,
      },
      options,
    );
  }

  buildTarget(query: string, page: number): URL {
    this.assertPage(page);
    const url = new URL(SEARCH_URL);
    url.searchParams.set('q', query);
    url.searchParams.set('page', String(page));
    return url;
  }
}
