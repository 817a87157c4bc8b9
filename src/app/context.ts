import type { Env } from '../config/env.js';
import type { FilterSet } from '../config/filters.js';
import { createDatabase, type DatabaseHandle } from '../db/connection.js';
import type { Logger } from '../lib/logger.js';
import { RequestRateLimiter } from '../lib/rate-limiter.js';
import { LogNotifier } from '../notifications/log-notifier.js';
import type { Notifier } from '../notifications/notifier.js';
import { TelegramNotifier } from '../notifications/telegram-notifier.js';
import { ChangeDetectionEngine } from '../pipeline/change-detection.js';
import { IngestionEngine } from '../pipeline/ingestion.js';
import { PriceDropReporter } from '../pipeline/price-drops.js';
import { ClassifiedsClient } from '../source/classifieds-client.js';
import { ClassifiedsSource } from '../source/classifieds-source.js';
import { InlineHtmlParser, type HtmlParser } from '../source/html-parser.js';
import type { ListingSource } from '../source/listing-source.js';
import { ParseWorkerPool } from '../source/parse-worker-pool.js';
import { DrizzleListingStore } from '../store/drizzle-listing-store.js';
import type { ListingStore } from '../store/listing-store.js';
import { DrizzleRunLog, type RunLog } from '../store/run-log.js';

/**
 * Every long-lived service, built once per process and handed to the scheduler and server.
 */
export interface AppContext {
  env: Env;
  logger: Logger;
  filters: FilterSet;
  store: ListingStore;
  runLog: RunLog;
  source: ListingSource;
  notifier: Notifier;
  rateLimiter: RequestRateLimiter;
  ingestion: IngestionEngine;
  changeDetection: ChangeDetectionEngine;
  priceDrops: PriceDropReporter;
  close(): Promise<void>;
}

export interface AppServices {
  store: ListingStore;
  runLog: RunLog;
  source: ListingSource;
  notifier: Notifier;
  rateLimiter: RequestRateLimiter;
  close?: () => Promise<void>;
}

/**
 * Wire engines over already-built services. Tests call this with in-memory doubles.
 */
export function assembleAppContext(
  env: Env,
  logger: Logger,
  filters: FilterSet,
  services: AppServices,
): AppContext {
  const { store, runLog, source, notifier } = services;

  const ingestion = new IngestionEngine(
    { store, source, notifier, runLog, filters, logger },
    {
      sourceTimeoutMs: env.SOURCE_TIMEOUT_MS,
      requireNotifiedForRecheck: env.RECHECK_REQUIRE_NOTIFIED,
    },
  );

  const changeDetection = new ChangeDetectionEngine(
    { store, source, notifier, runLog, logger },
    {
      stalenessHours: env.RECHECK_STALENESS_HOURS,
      batchSize: env.RECHECK_BATCH_SIZE,
      batchPauseMs: env.RECHECK_BATCH_PAUSE_MS,
      limit: env.RECHECK_LIMIT,
      unavailableRetentionHours: env.RECHECK_UNAVAILABLE_RETENTION_HOURS,
      sourceTimeoutMs: env.SOURCE_TIMEOUT_MS,
    },
  );

  const priceDrops = new PriceDropReporter({ store, notifier, runLog, logger });

  return {
    env,
    logger,
    filters,
    ...services,
    ingestion,
    changeDetection,
    priceDrops,
    async close() {
      await services.close?.();
    },
  };
}

function createNotifier(env: Env, logger: Logger): Notifier {
  if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
    return new TelegramNotifier({
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId: env.TELEGRAM_CHAT_ID,
      apiBaseUrl: env.TELEGRAM_API_BASE_URL,
      logger,
    });
  }
  logger.warn('Telegram is not configured; notifications go to the log only');
  return new LogNotifier(logger);
}

function createParser(env: Env, logger: Logger): HtmlParser {
  return env.SOURCE_PARSE_MODE === 'worker'
    ? new ParseWorkerPool({ size: 1, logger })
    : new InlineHtmlParser();
}

export function createAppContext(env: Env, logger: Logger, filters: FilterSet): AppContext {
  const database: DatabaseHandle = createDatabase(env, logger);

  const rateLimiter = new RequestRateLimiter({ requestsPerMinute: env.SOURCE_REQUESTS_PER_MINUTE, logger });
  const client = new ClassifiedsClient({
    requestTimeoutMs: env.SOURCE_REQUEST_TIMEOUT_MS,
    rateLimiter,
    logger,
  });
  const source = new ClassifiedsSource({
    client,
    parser: createParser(env, logger),
    baseUrl: env.SOURCE_BASE_URL,
    logger,
  });

  return assembleAppContext(env, logger, filters, {
    store: new DrizzleListingStore(database.db, logger),
    runLog: new DrizzleRunLog(database.db),
    source,
    notifier: createNotifier(env, logger),
    rateLimiter,
    async close() {
      await source.close();
      await database.close();
    },
  });
}
