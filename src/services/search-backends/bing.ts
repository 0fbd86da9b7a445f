import { BrowserSearchEngine, type EngineOptions } from './base.js';
import type { ExtractionRules } from '../result-extractor.js';

const SEARCH_URL = 'https://www.bing.com/search';
const RESULTS_PER_PAGE = 10;

export const BING_RULES: ExtractionRules = {
  container: '#b_results',
  item: 'li.b_algo',
  title: 'h2',
  link: 'h2 a',
  snippet: ['.b_caption p', 'p.b_lineclamp2', '.b_caption'],
  exclude: '.b_ad, .b_adTop',
  empty: '.b_no',
};

/**
 * Decode Bing redirect URLs to extract the real destination URL.
 * Bing wraps results in /ck/a?...&u=a1<base64url>...&ntb=1
 */
export function decodeBingUrl(bingUrl: string): string {
  try {
    const url = new URL(bingUrl);
    if (!url.hostname.endsWith('bing.com')) return bingUrl;
    const encoded = url.searchParams.get('u');
    if (!encoded) return bingUrl;

    // Strip the 'a1' prefix Bing adds before the base64 payload
    const base64 = encoded.startsWith('a1') ? encoded.slice(2) : encoded;
    const decoded = Buffer.from(base64, 'base64').toString('utf-8');
    if (decoded.startsWith('http')) return decoded;
    return bingUrl;
  } catch {
    return bingUrl;
  }
}

export class BingSearchEngine extends BrowserSearchEngine {
  constructor(options?: EngineOptions) {
    super(
      {
        name: 'bing',
        readySelector: '#b_results',
        consentSelectors: ['#bnp_btn_reject', '#bnp_btn_accept'],
        rules: BING_RULES,
      },
      options,
    );
  }

  buildTarget(query: string, page: number): URL {
    this.assertPage(page);
    const url = new URL(SEARCH_URL);
    url.searchParams.set('q', query);
    url.searchParams.set('first', String((page - 1) * RESULTS_PER_PAGE + 1));
    return url;
  }

  protected cleanLink(href: string): string {
    return decodeBingUrl(href);
  }
}
