import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../app/context.js';
import type { RunKind } from '../db/schema/index.js';
import { TaskInProgressError, describeError } from '../lib/errors.js';
import type { Scheduler } from '../scheduler/index.js';

const DAY_MS = 86_400_000;
const HOUR_MS = 3_600_000;

const RUN_KINDS: readonly RunKind[] = ['ingestion', 'recheck', 'price_drops'];

const summaryQuery = z.object({
  days: z.coerce.number().int().min(1).max(30).default(7),
});

const neverCheckedQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

const priceDropsQuery = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
  minDropEuros: z.coerce.number().int().min(0).default(500),
});

const recentChangesQuery = z.object({
  days: z.coerce.number().int().min(1).max(30).default(7),
});

const checkBody = z.object({
  listingIds: z.array(z.number().int().positive()).min(1).max(100),
});

function nightWindowHours(start: number, end: number): number {
  return (end - start + 24) % 24;
}

/**
 * A run kind is stale when its last finished run is older than twice its cadence.
 * Ingestion also gets the night window, when it is paused on purpose.
 */
export function stalenessThresholds(env: AppContext['env']): Record<RunKind, number> {
  return {
    ingestion:
      2 * (env.INGEST_INTERVAL_SECONDS + env.INGEST_JITTER_SECONDS) * 1000 +
      nightWindowHours(env.NIGHT_PAUSE_START_HOUR, env.NIGHT_PAUSE_END_HOUR) * HOUR_MS,
    recheck: 2 * DAY_MS,
    price_drops: 2 * 7 * DAY_MS,
  };
}

const EXCERPT_LENGTH = 200;

function excerpt(text: string | null): string | null {
  if (text === null || text.length <= EXCERPT_LENGTH) return text;
  return `${text.slice(0, EXCERPT_LENGTH)}...`;
}

function parseOrReply<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, reply: FastifyReply): T | null {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  const error = result.error.issues
    .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
    .join('; ');
  reply.code(400).send({ error });
  return null;
}

export function buildHealthServer(context: AppContext, options: { scheduler?: Scheduler } = {}): FastifyInstance {
  const server = Fastify({ logger: false });
  const { logger, env } = context;

  const priceDropsAlertQuery = z.object({
    days: z.coerce.number().int().min(1).max(90).default(env.PRICE_DROP_LOOKBACK_DAYS),
    minDropEuros: z.coerce.number().int().min(0).default(env.PRICE_DROP_THRESHOLD_EUR),
  });

  server.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const now = Date.now();
      const lastRuns = await context.runLog.lastRuns();
      const thresholds = stalenessThresholds(context.env);

      const runs: Record<string, { lastRun: string | null; status: string; healthy: boolean }> = {};
      let allHealthy = true;

      for (const kind of RUN_KINDS) {
        const run = lastRuns[kind];
        if (!run) {
          // Nothing has run yet, e.g. right after startup
          runs[kind] = { lastRun: null, status: 'no_runs', healthy: true };
          continue;
        }

        const finishedAt = run.completedAt ?? run.startedAt;
        const isStale = now - finishedAt.getTime() > thresholds[kind];
        const healthy = !isStale && run.status !== 'failed';
        if (!healthy) allHealthy = false;

        runs[kind] = {
          lastRun: finishedAt.toISOString(),
          status: isStale ? 'stale' : run.status,
          healthy,
        };
      }

      return reply.code(allHealthy ? 200 : 503).send({
        status: allHealthy ? 'healthy' : 'degraded',
        timestamp: new Date(now).toISOString(),
        runs,
        scheduler: options.scheduler?.getState() ?? null,
        rateLimiter: context.rateLimiter.getUsage(),
      });
    } catch (err) {
      logger.error({ err }, 'Health check error');
      return reply.code(503).send({ status: 'error', error: describeError(err) });
    }
  });

  // Liveness only: no dependencies checked
  server.get('/live', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ status: 'alive' });
  });

  // ─── Changes ─────────────────────────────────────────────────────────────

  server.get('/changes/summary', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parseOrReply(summaryQuery, request.query, reply);
    if (!query) return reply;

    const since = new Date(Date.now() - query.days * DAY_MS);
    const summary = await context.store.changesSummary(since);
    return reply.send({ days: query.days, since: since.toISOString(), ...summary });
  });

  server.get('/changes/never-checked', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parseOrReply(neverCheckedQuery, request.query, reply);
    if (!query) return reply;

    const listings = await context.store.neverChecked(query.limit);
    return reply.send({ count: listings.length, listings });
  });

  server.get('/changes/price-drops', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parseOrReply(priceDropsQuery, request.query, reply);
    if (!query) return reply;

    const drops = await context.priceDrops.find({ lookbackDays: query.days, thresholdEuros: query.minDropEuros });
    return reply.send({
      days: query.days,
      minDropEuros: query.minDropEuros,
      count: drops.length,
      drops: drops.map((d) => ({
        id: d.listing.id,
        title: d.listing.title,
        link: d.listing.link,
        previousPrice: d.listing.previousPrice,
        currentPrice: d.listing.price,
        dropAmount: d.dropAmount,
        dropPercent: d.dropPercent,
        changedAt: d.listing.priceChangedAt?.toISOString() ?? null,
      })),
    });
  });

  server.get('/changes/recent-price-changes', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parseOrReply(recentChangesQuery, request.query, reply);
    if (!query) return reply;

    const listings = await context.store.priceChangesSince(new Date(Date.now() - query.days * DAY_MS));
    return reply.send({
      days: query.days,
      count: listings.length,
      listings: listings.map((l) => ({
        id: l.id,
        title: l.title,
        brand: l.brand,
        year: l.year,
        link: l.link,
        currentPrice: l.price,
        previousPrice: l.previousPrice,
        priceChangedAt: l.priceChangedAt?.toISOString() ?? null,
        priceChangesCount: l.priceChangesCount,
      })),
    });
  });

  server.get('/changes/recent-description-changes', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parseOrReply(recentChangesQuery, request.query, reply);
    if (!query) return reply;

    const listings = await context.store.descriptionChangesSince(new Date(Date.now() - query.days * DAY_MS));
    return reply.send({
      days: query.days,
      count: listings.length,
      listings: listings.map((l) => ({
        id: l.id,
        title: l.title,
        brand: l.brand,
        year: l.year,
        link: l.link,
        currentDescription: excerpt(l.description),
        previousDescription: excerpt(l.previousDescription),
        descriptionChangedAt: l.descriptionChangedAt?.toISOString() ?? null,
        descriptionChangesCount: l.descriptionChangesCount,
      })),
    });
  });

  server.get('/changes/status', async (_request: FastifyRequest, reply: FastifyReply) => {
    const [summary, due, lastRuns] = await Promise.all([
      context.store.changesSummary(new Date(Date.now() - 7 * DAY_MS)),
      context.changeDetection.dueListings(),
      context.runLog.lastRuns(),
    ]);
    const lastRecheck = lastRuns.recheck;

    return reply.send({
      status: 'operational',
      ingestionRunning: context.ingestion.running,
      recheckRunning: context.changeDetection.running,
      dueForRecheck: due.length,
      last7Days: summary,
      lastRecheck: lastRecheck
        ? {
            status: lastRecheck.status,
            startedAt: lastRecheck.startedAt.toISOString(),
            completedAt: lastRecheck.completedAt?.toISOString() ?? null,
          }
        : null,
      schedule: {
        recheckTime: env.RECHECK_TIME,
        priceDropWeekday: env.PRICE_DROP_WEEKDAY,
        priceDropTime: env.PRICE_DROP_TIME,
      },
    });
  });

  server.post('/changes/check', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseOrReply(checkBody, request.body, reply);
    if (!body) return reply;

    const result = await context.changeDetection.recheckListings(body.listingIds);
    return reply.send(result);
  });

  // ─── Manual triggers ─────────────────────────────────────────────────────

  server.post('/changes/check-all', async (_request: FastifyRequest, reply: FastifyReply) => {
    if (context.changeDetection.running) {
      return reply.code(409).send({ error: 'Recheck pass is already running' });
    }
    try {
      const summary = await context.changeDetection.runScheduledPass();
      return reply.send(summary);
    } catch (err) {
      if (err instanceof TaskInProgressError) {
        return reply.code(409).send({ error: err.message });
      }
      throw err;
    }
  });

  server.post('/changes/price-drops-alert', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parseOrReply(priceDropsAlertQuery, request.query, reply);
    if (!query) return reply;

    const drops = await context.priceDrops.run({ lookbackDays: query.days, thresholdEuros: query.minDropEuros });
    return reply.send({
      days: query.days,
      minDropEuros: query.minDropEuros,
      count: drops.length,
      alerted: drops.length > 0,
    });
  });

  server.post('/ingest', async (_request: FastifyRequest, reply: FastifyReply) => {
    if (context.ingestion.running) {
      return reply.code(409).send({ error: 'Ingestion pass is already running' });
    }
    try {
      const result = await context.ingestion.runAll();
      return reply.send({
        inserted: result.inserted,
        failedFilters: result.failedFilters,
        elapsedMs: result.elapsedMs,
        filters: result.filters.map(({ newListings, ...counts }) => ({
          ...counts,
          newListingIds: newListings.map((l) => l.id),
        })),
      });
    } catch (err) {
      if (err instanceof TaskInProgressError) {
        return reply.code(409).send({ error: err.message });
      }
      throw err;
    }
  });

  server.setErrorHandler((err, _request, reply) => {
    logger.error({ err }, 'Request failed');
    reply.code(500).send({ error: describeError(err) });
  });

  return server;
}

export async function startHealthServer(server: FastifyInstance, port: number): Promise<void> {
  await server.listen({ port, host: '0.0.0.0' });
}

export async function stopHealthServer(server: FastifyInstance): Promise<void> {
  await server.close();
}
