import { SourceHttpError } from '../../src/lib/errors';
import { RequestRateLimiter } from '../../src/lib/rate-limiter';
import { ClassifiedsClient } from '../../src/source/classifieds-client';
import { ClassifiedsSource } from '../../src/source/classifieds-source';
import { InlineHtmlParser } from '../../src/source/html-parser';
import { makeFilter, silentLogger } from '../support/fixtures';

const BASE_URL = 'https://cars.example';
const KNOWN = `${BASE_URL}/adv/1_known/`;
const FRESH = `${BASE_URL}/adv/2_fresh/`;

const SEARCH_PAGE = `
  <div class="advert js-item-listing">
    <a class="advert__content-title" href="/adv/1_known/">BMW 118d 2015</a>
    <a class="advert__content-price">€9,800</a>
  </div>
  <div class="advert js-item-listing">
    <a class="advert__content-title" href="/adv/2_fresh/">BMW 320i 2017</a>
    <a class="advert__content-price">€11,500</a>
  </div>`;

function createSource(pages: Record<string, { status: number; body: string }>, onRequest?: (url: string) => void) {
  const requested: string[] = [];
  const client = new ClassifiedsClient({
    requestTimeoutMs: 1_000,
    maxRetries: 0,
    rateLimiter: new RequestRateLimiter({ requestsPerMinute: 60_000 }),
    logger: silentLogger,
    fetchImpl: async (input) => {
      const url = String(input);
      requested.push(url);
      onRequest?.(url);
      const page = pages[url] ?? { status: 404, body: '' };
      return new Response(page.body, { status: page.status });
    },
  });
  const source = new ClassifiedsSource({ client, parser: new InlineHtmlParser(), baseUrl: BASE_URL, logger: silentLogger });
  return { source, requested };
}

describe('ClassifiedsSource.scrape', () => {
  const filter = makeFilter({ url: `${BASE_URL}/bmw/` });

  it('should fetch detail pages only for links it does not know', async () => {
    const { source, requested } = createSource({
      [filter.url]: { status: 200, body: SEARCH_PAGE },
      [FRESH]: { status: 200, body: '<h1>BMW 320i 2017</h1><div class="js-description">Sunroof, new tyres.</div>' },
    });

    const listings = await source.scrape(filter, new Set([KNOWN]));

    expect(requested).toEqual([filter.url, FRESH]);
    expect(listings.map((l) => [l.link, l.description])).toEqual([
      [KNOWN, null],
      [FRESH, 'Sunroof, new tyres.'],
    ]);
  });

  it('should keep a card whose detail page cannot be fetched', async () => {
    const { source } = createSource({
      [filter.url]: { status: 200, body: SEARCH_PAGE },
      [FRESH]: { status: 500, body: 'error' },
    });

    const listings = await source.scrape(filter, new Set([KNOWN]));

    expect(listings).toHaveLength(2);
    expect(listings[1]).toMatchObject({ link: FRESH, price: '€11,500', description: null });
  });

  it('should return cards without descriptions once the signal has aborted', async () => {
    const controller = new AbortController();
    const { source, requested } = createSource(
      {
        [filter.url]: { status: 200, body: SEARCH_PAGE },
        [KNOWN]: { status: 200, body: '<h1>BMW 118d 2015</h1><div class="js-description">One owner.</div>' },
        [FRESH]: { status: 200, body: '<h1>BMW 320i 2017</h1><div class="js-description">Sunroof, new tyres.</div>' },
      },
      (url) => {
        if (url === KNOWN) controller.abort();
      },
    );

    const listings = await source.scrape(filter, new Set(), { signal: controller.signal });

    expect(requested).toEqual([filter.url, KNOWN]);
    expect(listings.map((l) => [l.link, l.description])).toEqual([
      [KNOWN, 'One owner.'],
      [FRESH, null],
    ]);
  });

  it('should reject when the signal aborts before the search page arrives', async () => {
    const { source, requested } = createSource({ [filter.url]: { status: 200, body: SEARCH_PAGE } });

    await expect(source.scrape(filter, new Set(), { signal: AbortSignal.abort(new Error('deadline reached')) })).rejects.toThrow(
      'deadline reached',
    );
    expect(requested).toEqual([]);
  });

  it('should propagate a failing search page', async () => {
    const { source } = createSource({ [filter.url]: { status: 502, body: 'bad gateway' } });

    await expect(source.scrape(filter, new Set())).rejects.toThrow(SourceHttpError);
  });
});

describe('ClassifiedsSource.refetch', () => {
  it('should return the current snapshot', async () => {
    const { source } = createSource({
      [KNOWN]: {
        status: 200,
        body: '<h1>BMW 118d 2015</h1><div class="announcement-price__cost">€9,500</div><div class="js-description">Price reduced.</div>',
      },
    });

    await expect(source.refetch(KNOWN)).resolves.toEqual({
      kind: 'found',
      snapshot: { title: 'BMW 118d 2015', price: '€9,500', description: 'Price reduced.' },
    });
  });

  it('should report not_found for a 404 and for a removed-listing page', async () => {
    const { source } = createSource({
      [FRESH]: { status: 200, body: '<div class="not-found">Removed</div>' },
    });

    await expect(source.refetch(KNOWN)).resolves.toEqual({ kind: 'not_found' });
    await expect(source.refetch(FRESH)).resolves.toEqual({ kind: 'not_found' });
  });

  it('should propagate other failures', async () => {
    const { source } = createSource({ [KNOWN]: { status: 500, body: 'error' } });

    await expect(source.refetch(KNOWN)).rejects.toThrow('Classifieds request failed: 500');
  });
});
