import path from 'node:path';
import { ListingNotFoundError, SourceError } from '../../src/lib/errors';
import { handleParseRequest } from '../../src/source/html-parser';
import { ParseWorkerPool } from '../../src/source/parse-worker-pool';
import { makeFilter, silentLogger } from '../support/fixtures';

describe('handleParseRequest', () => {
  it('should answer a search request with the parsed cards', () => {
    const html = `<div class="advert js-item-listing"><a class="advert__content-title" href="/adv/9/">Audi A3 2016</a></div>`;

    const response = handleParseRequest({ id: 7, kind: 'search', html, filter: makeFilter(), baseUrl: 'https://cars.example' });

    expect(response).toMatchObject({ id: 7, ok: true, kind: 'search' });
    expect(response.ok && response.kind === 'search' ? response.listings.map((l) => l.link) : []).toEqual([
      'https://cars.example/adv/9/',
    ]);
  });

  it('should carry the error name of a removed listing', () => {
    const response = handleParseRequest({
      id: 8,
      kind: 'listing',
      html: '<div class="announcement-not-found"></div>',
      url: 'https://cars.example/adv/9/',
    });

    expect(response).toEqual({
      id: 8,
      ok: false,
      error: { name: 'ListingNotFoundError', message: 'Listing not found: https://cars.example/adv/9/' },
    });
  });
});

describe('ParseWorkerPool', () => {
  let pool: ParseWorkerPool;

  beforeEach(() => {
    pool = new ParseWorkerPool({
      size: 2,
      logger: silentLogger,
      workerFile: path.join(__dirname, '../fixtures/parse-worker-stub.js'),
    });
  });

  afterEach(async () => {
    await pool.close();
  });

  it('should route responses back to their callers', async () => {
    const [first, second] = await Promise.all([
      pool.listingPage('first body', 'https://cars.example/adv/1/'),
      pool.listingPage('second body', 'https://cars.example/adv/2/'),
    ]);

    expect(first).toEqual({ title: 'https://cars.example/adv/1/', price: null, description: 'first body' });
    expect(second).toEqual({ title: 'https://cars.example/adv/2/', price: null, description: 'second body' });
    await expect(pool.searchResults('<html></html>', makeFilter(), 'https://cars.example')).resolves.toEqual([]);
  });

  it('should rebuild ListingNotFoundError from the worker', async () => {
    await expect(pool.listingPage('gone', 'https://cars.example/adv/3/')).rejects.toThrow(ListingNotFoundError);
  });

  it('should fail in-flight requests when a worker crashes and recover afterwards', async () => {
    await expect(pool.listingPage('crash', 'https://cars.example/adv/4/')).rejects.toThrow(
      'Parse worker failed: worker blew up',
    );
    // Round-robin lands on the other slot, then back on the replaced one
    await expect(pool.listingPage('ok', 'https://cars.example/adv/5/')).resolves.toMatchObject({ description: 'ok' });
    await expect(pool.listingPage('ok again', 'https://cars.example/adv/6/')).resolves.toMatchObject({
      description: 'ok again',
    });
  });

  it('should refuse work once closed', async () => {
    await pool.close();

    await expect(pool.listingPage('late', 'https://cars.example/adv/7/')).rejects.toThrow(SourceError);
  });
});
