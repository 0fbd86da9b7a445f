import { JSDOM } from 'jsdom';
import { createSearchHit, type SearchHit } from '../types/search.js';
import { createLogger } from '../logger.js';

const log = createLogger('extractor');

/** One selector, or several tried in order until one matches. */
export type SelectorList = string | readonly string[];

/**
 * CSS selectors that locate results on an engine's page.
 * `item`, `title`, `link` and `snippet` are resolved inside `container`.
 */
export interface ExtractionRules {
  container: string;
  item: string;
  title: SelectorList;
  link: SelectorList;
  snippet?: SelectorList;
  /** Items inside an element matching this selector are skipped (ads, widgets). */
  exclude?: string;
  /** Marker of an engine's "no results" page, used when the container is absent. */
  empty?: string;
}

export type ExtractionOutcome =
  | { status: 'ok'; hits: SearchHit[]; skipped: number }
  | { status: 'missing-container' };

function firstMatch(root: Element, selectors: SelectorList): Element | null {
  const list = typeof selectors === 'string' ? [selectors] : selectors;
  for (const selector of list) {
    const match = root.querySelector(selector);
    if (match) return match;
  }
  return null;
}

/** Resolves `href` against the page URL. Returns null for anything but http(s). */
export function resolveLink(href: string, pageUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed, pageUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    return /^https?:\/\//i.test(trimmed) ? trimmed : url.href;
  } catch {
    return null;
  }
}

export function extractHits(
  html: string,
  pageUrl: string,
  rules: ExtractionRules,
  cleanLink: (href: string) => string = (href) => href,
): ExtractionOutcome {
  const dom = new JSDOM(html, { url: pageUrl });
  const doc = dom.window.document;

  const container = doc.querySelector(rules.container);
  if (!container) {
    if (rules.empty && doc.querySelector(rules.empty)) {
      log.debug('Empty results marker found', { pageUrl, selector: rules.empty });
      return { status: 'ok', hits: [], skipped: 0 };
    }
    return { status: 'missing-container' };
  }

  const hits: SearchHit[] = [];
  let skipped = 0;
  const items = container.querySelectorAll(rules.item);

  items.forEach((item, index) => {
    if (rules.exclude && item.closest(rules.exclude)) {
      log.debug('Skipping excluded item', { position: index + 1 });
      skipped++;
      return;
    }

    const title = firstMatch(item, rules.title)?.textContent?.trim() ?? '';
    const href = firstMatch(item, rules.link)?.getAttribute('href') ?? '';
    const link = href ? resolveLink(cleanLink(href), pageUrl) : null;

    if (!title || !link) {
      log.debug('Skipping item without title or link', { position: index + 1, hasTitle: Boolean(title), href });
      skipped++;
      return;
    }

    const snippet = rules.snippet ? firstMatch(item, rules.snippet)?.textContent ?? '' : '';
    hits.push(createSearchHit(title, link, snippet));
  });

  dom.window.close();
  return { status: 'ok', hits, skipped };
}
