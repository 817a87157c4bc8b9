import type { FastifyInstance } from 'fastify';
import { buildHealthServer } from '../../src/health/server';
import { createTestContext } from '../support/context';
import type { RefetchResult } from '../../src/source/listing-source';
import { found } from '../support/fakes';
import { makeRawListing } from '../support/fixtures';

describe('health server', () => {
  let server: FastifyInstance | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  function build(envOverrides: Record<string, string> = {}) {
    const test = createTestContext(envOverrides);
    server = buildHealthServer(test.context);
    return { ...test, server };
  }

  it('should answer the liveness check', async () => {
    const { server } = build();

    const response = await server.inject({ method: 'GET', url: '/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'alive' });
  });

  it('should be healthy before any run has finished', async () => {
    const { server } = build();

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: 'healthy',
      runs: {
        ingestion: { lastRun: null, status: 'no_runs', healthy: true },
        recheck: { lastRun: null, status: 'no_runs', healthy: true },
        price_drops: { lastRun: null, status: 'no_runs', healthy: true },
      },
      scheduler: null,
      rateLimiter: { lastMinute: 0, limit: 20 },
    });
  });

  it('should report degraded when the last run failed', async () => {
    const { server, runLog } = build();
    const runId = await runLog.start('recheck');
    await runLog.finish(runId, 'failed', {}, 'connection refused');

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({
      status: 'degraded',
      runs: { recheck: { status: 'failed', healthy: false } },
    });
  });

  it('should report a run older than its threshold as stale', async () => {
    const { server, runLog } = build();
    const runId = await runLog.start('ingestion');
    await runLog.finish(runId, 'completed', {});
    runLog.runs[0].completedAt = new Date(Date.now() - 3 * 86_400_000);

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ runs: { ingestion: { status: 'stale', healthy: false } } });
  });

  it('should summarise recent changes', async () => {
    const { server, store } = build();
    store.seed({ link: 'https://cars.example/adv/1/', priceChangedAt: new Date(), lastCheckedAt: new Date() });
    store.seed({ link: 'https://cars.example/adv/2/', isAvailable: false, lastCheckedAt: new Date() });
    store.seed({ link: 'https://cars.example/adv/3/' });

    const response = await server.inject({ method: 'GET', url: '/changes/summary?days=3' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      days: 3,
      priceChanges: 1,
      descriptionChanges: 0,
      neverChecked: 1,
      unavailable: 1,
      total: 3,
    });
  });

  it('should reject out-of-range query parameters', async () => {
    const { server } = build();

    const response = await server.inject({ method: 'GET', url: '/changes/summary?days=31' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'days: Number must be less than or equal to 30' });
  });

  it('should list never-checked listings', async () => {
    const { server, store } = build();
    store.seed({ id: 1, link: 'https://cars.example/adv/1/' });
    store.seed({ id: 2, link: 'https://cars.example/adv/2/', lastCheckedAt: new Date() });

    const response = await server.inject({ method: 'GET', url: '/changes/never-checked?limit=5' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.count).toBe(1);
    expect(body.listings[0]).toMatchObject({ id: 1, link: 'https://cars.example/adv/1/' });
  });

  it('should list price drops above the requested amount', async () => {
    const { server, store } = build();
    const changedAt = new Date(Date.now() - 2 * 86_400_000);
    store.seed({
      id: 4,
      link: 'https://cars.example/adv/4/',
      title: 'BMW 520d',
      previousPrice: '€20,000',
      price: '€18,000',
      priceChangedAt: changedAt,
    });
    store.seed({ id: 5, link: 'https://cars.example/adv/5/', previousPrice: '€20,000', price: '€19,500', priceChangedAt: changedAt });

    const response = await server.inject({ method: 'GET', url: '/changes/price-drops?days=7&minDropEuros=1000' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      days: 7,
      minDropEuros: 1000,
      count: 1,
      drops: [
        {
          id: 4,
          title: 'BMW 520d',
          link: 'https://cars.example/adv/4/',
          previousPrice: '€20,000',
          currentPrice: '€18,000',
          dropAmount: 2000,
          dropPercent: 10,
          changedAt: changedAt.toISOString(),
        },
      ],
    });
  });

  it('should recheck the requested listings on demand', async () => {
    const { server, store, source } = build();
    store.seed({ id: 1, link: 'https://cars.example/adv/1/', price: '€12,500', lastCheckedAt: new Date() });
    source.setPage('https://cars.example/adv/1/', found('€12,000', null));

    const response = await server.inject({ method: 'POST', url: '/changes/check', payload: { listingIds: [1, 42] } });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      missing: [42],
      outcomes: [{ listingId: 1, kind: 'changed', change: { price: { old: '€12,500', new: '€12,000' } } }],
      summary: { checked: 1, changed: 1, priceChanges: 1 },
    });
    expect(store.get(1)?.price).toBe('€12,000');
  });

  it('should reject an empty recheck request', async () => {
    const { server } = build();

    const response = await server.inject({ method: 'POST', url: '/changes/check', payload: { listingIds: [] } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'listingIds: Array must contain at least 1 element(s)' });
  });

  it('should run an ingestion pass on demand', async () => {
    const { server, source } = build();
    source.setListings('bmw', [makeRawListing({ link: 'https://cars.example/adv/9/' })]);

    const response = await server.inject({ method: 'POST', url: '/ingest' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      inserted: 1,
      failedFilters: [],
      filters: [{ filterName: 'bmw', scraped: 1, inserted: 1, newListingIds: [1] }],
    });
  });

  it('should refuse a manual ingestion while one is running', async () => {
    const { server, source, context } = build();
    let release: (value: never[]) => void = () => undefined;
    jest.spyOn(source, 'scrape').mockReturnValue(
      new Promise((resolve) => {
        release = resolve;
      }),
    );
    const pass = context.ingestion.runAll();

    const response = await server.inject({ method: 'POST', url: '/ingest' });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({ error: 'Ingestion pass is already running' });

    release([]);
    await pass;
  });

  it('should run a full recheck pass on demand', async () => {
    const { server, store, source } = build();
    store.seed({ id: 1, link: 'https://cars.example/adv/1/', price: '€12,500', description: 'One owner.' });
    source.setPage('https://cars.example/adv/1/', found('€11,000', 'One owner.'));

    const response = await server.inject({ method: 'POST', url: '/changes/check-all' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ checked: 1, changed: 1, priceChanges: 1, descriptionChanges: 0, errors: 0 });
    expect(store.get(1)?.price).toBe('€11,000');
  });

  it('should refuse a full recheck while one is running', async () => {
    const { server, store, source, context } = build();
    store.seed({ id: 1, link: 'https://cars.example/adv/1/' });
    let release: (value: RefetchResult) => void = () => undefined;
    jest.spyOn(source, 'refetch').mockReturnValue(
      new Promise((resolve) => {
        release = resolve;
      }),
    );
    const pass = context.changeDetection.runScheduledPass();

    const response = await server.inject({ method: 'POST', url: '/changes/check-all' });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({ error: 'Recheck pass is already running' });

    release({ kind: 'not_found' });
    await pass;
  });

  it('should list recent price changes within the requested days', async () => {
    const { server, store } = build();
    const changedAt = new Date(Date.now() - 2 * 86_400_000);
    store.seed({
      id: 1,
      link: 'https://cars.example/adv/1/',
      title: 'BMW 320d 2018',
      previousPrice: '€13,000',
      price: '€12,500',
      priceChangedAt: changedAt,
      priceChangesCount: 1,
    });
    store.seed({
      id: 2,
      link: 'https://cars.example/adv/2/',
      previousPrice: '€9,000',
      price: '€8,500',
      priceChangedAt: new Date(Date.now() - 10 * 86_400_000),
    });

    const response = await server.inject({ method: 'GET', url: '/changes/recent-price-changes?days=7' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      days: 7,
      count: 1,
      listings: [
        {
          id: 1,
          title: 'BMW 320d 2018',
          brand: 'BMW',
          year: 2018,
          link: 'https://cars.example/adv/1/',
          currentPrice: '€12,500',
          previousPrice: '€13,000',
          priceChangedAt: changedAt.toISOString(),
          priceChangesCount: 1,
        },
      ],
    });
  });

  it('should shorten long descriptions in recent description changes', async () => {
    const { server, store } = build();
    const changedAt = new Date(Date.now() - 86_400_000);
    store.seed({
      id: 3,
      link: 'https://cars.example/adv/3/',
      description: 'a'.repeat(250),
      previousDescription: 'One owner.',
      descriptionChangedAt: changedAt,
      descriptionChangesCount: 2,
    });

    const response = await server.inject({ method: 'GET', url: '/changes/recent-description-changes' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({ days: 7, count: 1 });
    expect(body.listings[0]).toEqual({
      id: 3,
      title: 'BMW 320d 2018',
      brand: 'BMW',
      year: 2018,
      link: 'https://cars.example/adv/3/',
      currentDescription: `${'a'.repeat(200)}...`,
      previousDescription: 'One owner.',
      descriptionChangedAt: changedAt.toISOString(),
      descriptionChangesCount: 2,
    });
  });

  it('should send a price drop alert with the configured defaults', async () => {
    const { server, store, notifier } = build();
    store.seed({
      id: 4,
      link: 'https://cars.example/adv/4/',
      previousPrice: '€20,000',
      price: '€18,000',
      priceChangedAt: new Date(Date.now() - 2 * 86_400_000),
    });

    const response = await server.inject({ method: 'POST', url: '/changes/price-drops-alert' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ days: 7, minDropEuros: 1000, count: 1, alerted: true });
    expect(notifier.priceDropAlert).toHaveBeenCalledTimes(1);
    expect(notifier.priceDropAlert).toHaveBeenCalledWith([expect.objectContaining({ dropAmount: 2000 })], 1000);
  });

  it('should not alert when no drop reaches the requested amount', async () => {
    const { server, store, notifier } = build();
    store.seed({
      id: 4,
      link: 'https://cars.example/adv/4/',
      previousPrice: '€20,000',
      price: '€18,000',
      priceChangedAt: new Date(Date.now() - 2 * 86_400_000),
    });

    const response = await server.inject({ method: 'POST', url: '/changes/price-drops-alert?minDropEuros=5000' });

    expect(response.json()).toEqual({ days: 7, minDropEuros: 5000, count: 0, alerted: false });
    expect(notifier.priceDropAlert).not.toHaveBeenCalled();
  });

  it('should report change tracking status', async () => {
    const { server, store } = build();
    store.seed({ id: 1, link: 'https://cars.example/adv/1/' });

    const response = await server.inject({ method: 'GET', url: '/changes/status' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'operational',
      ingestionRunning: false,
      recheckRunning: false,
      dueForRecheck: 1,
      last7Days: { priceChanges: 0, descriptionChanges: 0, neverChecked: 1, unavailable: 0, total: 1 },
      lastRecheck: null,
      schedule: { recheckTime: '14:30', priceDropWeekday: 0, priceDropTime: '10:00' },
    });
  });
});
