import { describe, it, expect } from 'vitest';
import { YahooSearchEngine, decodeYahooUrl } from './yahoo.js';
import { FakePage } from '../../testing/fakes.js';

const REDIRECT = 'https://r.search.yahoo.com/_ylt=abc/RV=2/RE=1/RO=10/RU=https%3a%2f%2fexample.com%2fdocs%2f/RK=2/RS=xyz-';

describe('decodeYahooUrl', () => {
  it('extracts the RU target', () => {
    expect(decodeYahooUrl(REDIRECT)).toBe('https://example.com/docs/');
  });

  it('returns direct links unchanged', () => {
    expect(decodeYahooUrl('https://example.com/direct')).toBe('https://example.com/direct');
  });

  it('returns the link unchanged when the target is malformed', () => {
    const link = 'https://r.search.yahoo.com/RU=%E0%A4%A/RK=2';
    expect(decodeYahooUrl(link)).toBe(link);
  });
});

describe('YahooSearchEngine', () => {
  it('pages in steps of seven', () => {
    const engine = new YahooSearchEngine();
    expect(engine.buildTarget('node streams', 1).href).toBe('https://search.yahoo.com/search?q=node+streams&b=1');
    expect(engine.buildTarget('node streams', 3).href).toBe('https://search.yahoo.com/search?q=node+streams&b=15');
  });

  it('rejects the consent dialog within the consent timeout', async () => {
    const engine = new YahooSearchEngine({ consentTimeoutMs: 200 });
    const page = new FakePage({ html: '<div id="web"></div>', clickable: ['button.reject-all'] });

    await engine.navigate({ id: 'session-1', page }, engine.buildTarget('q', 1));

    expect(page.clickAttempts).toEqual([{ selector: 'button.reject-all', timeout: 200 }]);
    expect(page.waitedFor).toEqual(['#web']);
  });

  it('extracts results with decoded links', async () => {
    const engine = new YahooSearchEngine();
    const page = new FakePage({
      html: `<div id="web"><ol>
        <li><div class="algo"><h3><a href="${REDIRECT}">Docs home</a></h3><div class="compText"><p>Reference docs</p></div></div></li>
      </ol></div>`,
    });

    await expect(engine.extract({ id: 'session-1', page })).resolves.toEqual([
      { title: 'Docs home', link: 'https://example.com/docs/', snippet: 'Reference docs' },
    ]);
  });
});
