import type { BrowserSession, SessionPage } from '../browser.js';
import type { SearchEngine } from '../search-engine.js';
import { extractHits, type ExtractionRules } from '../result-extractor.js';
import type { SearchHit } from '../../types/search.js';
import { ExtractionFailedError, InvalidPageError, NavigationTimeoutError, isTimeoutError } from '../../errors.js';
import { createLogger, errorMessage, type Logger } from '../../logger.js';

export const DEFAULT_NAVIGATION_TIMEOUT_MS = 30000;
export const DEFAULT_CONSENT_TIMEOUT_MS = 1500;

export interface EngineOptions {
  /** Budget shared by goto, consent dismissal and the readiness wait. */
  navigationTimeoutMs?: number;
  /** How long to look for each consent button before moving on. */
  consentTimeoutMs?: number;
  /** Overrides for the engine's built-in selectors, for when its markup drifts. */
  rules?: Partial<ExtractionRules>;
  /** Replaces the results-ready selector; keep it in step with a `rules.container` override. */
  readySelector?: string;
  consentSelectors?: string[];
}

export interface EngineProfile {
  name: string;
  /** Matches only once results (or the engine's no-results marker) have rendered. */
  readySelector: string;
  consentSelectors: string[];
  rules: ExtractionRules;
}

export abstract class BrowserSearchEngine implements SearchEngine {
  readonly name: string;
  readonly rules: ExtractionRules;
  readonly consentSelectors: readonly string[];
  protected readonly readySelector: string;
  protected readonly navigationTimeoutMs: number;
  protected readonly consentTimeoutMs: number;
  protected readonly log: Logger;

  constructor(profile: EngineProfile, options?: EngineOptions) {
    this.name = profile.name;
    this.readySelector = options?.readySelector ?? profile.readySelector;
    this.rules = { ...profile.rules, ...options?.rules };
    this.consentSelectors = options?.consentSelectors ?? profile.consentSelectors;
    this.navigationTimeoutMs = options?.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS;
    this.consentTimeoutMs = options?.consentTimeoutMs ?? DEFAULT_CONSENT_TIMEOUT_MS;
    this.log = createLogger(profile.name);
  }

  abstract buildTarget(query: string, page: number): URL;

  /** Turns an engine redirect link into the destination URL. */
  protected cleanLink(href: string): string {
    return href;
  }

  protected assertPage(page: number): void {
    if (!Number.isInteger(page) || page < 1) {
      throw new InvalidPageError(page);
    }
  }

  async navigate(session: BrowserSession, target: URL): Promise<void> {
    const { page } = session;
    const start = Date.now();
    const deadline = start + this.navigationTimeoutMs;
    const remaining = () => Math.max(1, deadline - Date.now());

    this.log.info('Navigating', { sessionId: session.id, url: target.href });
    try {
      await page.goto(target.href, { waitUntil: 'domcontentloaded', timeout: remaining() });
      await this.dismissConsent(page, remaining);
      await page.waitForSelector(this.readySelector, { timeout: remaining(), state: 'attached' });
    } catch (error) {
      if (isTimeoutError(error)) {
        this.log.warn('Results page not ready in time', {
          sessionId: session.id,
          url: target.href,
          timeoutMs: this.navigationTimeoutMs,
        });
        throw new NavigationTimeoutError(this.name, target.href, this.navigationTimeoutMs, { cause: error });
      }
      throw error;
    }
    this.log.info('Navigation complete', { sessionId: session.id, durationMs: Date.now() - start });
  }

  async extract(session: BrowserSession): Promise<SearchHit[]> {
    const html = await session.page.content();
    const pageUrl = session.page.url();
    const outcome = extractHits(html, pageUrl, this.rules, (href) => this.cleanLink(href));

    if (outcome.status === 'missing-container') {
      this.log.warn('Results container not found, markup may have changed', {
        sessionId: session.id,
        url: pageUrl,
        selector: this.rules.container,
      });
      throw new ExtractionFailedError(this.name, this.rules.container);
    }

    this.log.debug('Extracted results', { sessionId: session.id, count: outcome.hits.length, skipped: outcome.skipped });
    return outcome.hits;
  }

  // One combined selector, so a page without a banner costs a single grace period.
  private async dismissConsent(page: SessionPage, remaining: () => number): Promise<void> {
    if (this.consentSelectors.length === 0) return;
    const selector = this.consentSelectors.join(', ');
    try {
      await page.click(selector, { timeout: Math.min(this.consentTimeoutMs, remaining()) });
      this.log.debug('Dismissed consent dialog', { selector });
    } catch (error) {
      if (!isTimeoutError(error)) throw error;
      this.log.debug('Consent dialog not present', { selector, error: errorMessage(error) });
    }
  }
}
