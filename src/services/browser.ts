import { chromium, type Browser } from 'playwright';
import { randomUUID } from 'node:crypto';
import { createLogger } from '../logger.js';

const log = createLogger('browser');

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

const LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-infobars',
];

/**
 * The slice of a Playwright page that engine adapters drive.
 * Kept narrow so tests can hand adapters an in-memory page.
 */
export interface SessionPage {
  goto(url: string, options: { timeout: number; waitUntil: 'load' | 'domcontentloaded' }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number; state?: 'attached' | 'visible' }): Promise<unknown>;
  click(selector: string, options: { timeout: number }): Promise<void>;
  content(): Promise<string>;
  url(): string;
}

/** A live browser process with one context and one page, lent out by the session pool. */
export interface BrowserSession {
  readonly id: string;
  readonly page: SessionPage;
}

export interface SessionFactory {
  create(): Promise<BrowserSession>;
  destroy(session: BrowserSession): Promise<void>;
  close(): Promise<void>;
  /** Called with the session id when a browser dies without being destroyed. */
  onDisconnect(listener: (sessionId: string) => void): void;
}

export interface BrowserServiceOptions {
  headless?: boolean;
  channel?: string;
  userAgent?: string;
  locale?: string;
  timezoneId?: string;
}

// Runs inside the page before any site script.
function maskAutomation(): void {
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
  Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
  Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
  Object.defineProperty(window, 'chrome', { value: { runtime: {} } });
}

export class BrowserService implements SessionFactory {
  private browsers: Map<string, Browser> = new Map();
  private disconnectListeners: Array<(sessionId: string) => void> = [];
  private headless: boolean;
  private channel: string | undefined;
  private userAgent: string;
  private locale: string;
  private timezoneId: string;

  constructor(options?: BrowserServiceOptions) {
    this.headless = options?.headless ?? true;
    this.channel = options?.channel;
    this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
    this.locale = options?.locale ?? 'en-US';
    this.timezoneId = options?.timezoneId ?? 'America/New_York';
  }

  async create(): Promise<BrowserSession> {
    const id = randomUUID();
    log.info('Launching chromium', { sessionId: id, headless: this.headless, channel: this.channel ?? 'bundled' });
    const start = Date.now();
    const browser = await chromium.launch({
      headless: this.headless,
      channel: this.channel,
      args: LAUNCH_ARGS,
    });
    try {
      const context = await browser.newContext({
        userAgent: this.userAgent,
        viewport: { width: 1280, height: 720 },
        locale: this.locale,
        timezoneId: this.timezoneId,
      });
      await context.addInitScript(maskAutomation);
      const page = await context.newPage();
      browser.on('disconnected', () => {
        if (!this.browsers.delete(id)) return;
        log.warn('Browser process disconnected unexpectedly', { sessionId: id });
        for (const listener of this.disconnectListeners) listener(id);
      });
      this.browsers.set(id, browser);
      log.info('Browser session ready', { sessionId: id, durationMs: Date.now() - start });
      return { id, page };
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  onDisconnect(listener: (sessionId: string) => void): void {
    this.disconnectListeners.push(listener);
  }

  async destroy(session: BrowserSession): Promise<void> {
    const browser = this.browsers.get(session.id);
    if (!browser) {
      log.debug('Session already destroyed', { sessionId: session.id });
      return;
    }
    this.browsers.delete(session.id);
    await browser.close();
    log.debug('Browser session destroyed', { sessionId: session.id });
  }

  async close(): Promise<void> {
    log.info('Closing remaining browsers', { count: this.browsers.size });
    const pending = Array.from(this.browsers.entries());
    this.browsers.clear();
    const outcomes = await Promise.allSettled(pending.map(([, browser]) => browser.close()));
    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        log.error('Failed to close browser', { sessionId: pending[i][0], error: message });
      }
    });
  }
}
