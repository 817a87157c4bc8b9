import { orderFilters, type FilterDefinition, type FilterSet } from '../config/filters.js';
import { TaskInProgressError, describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { DEFAULT_ABORT_GRACE_MS, withDeadline } from '../lib/timeout.js';
import type { Notifier } from '../notifications/notifier.js';
import type { ListingSource } from '../source/listing-source.js';
import type { Listing, ListingStore } from '../store/listing-store.js';
import type { RunLog } from '../store/run-log.js';

export interface FilterRunResult {
  filterName: string;
  scraped: number;
  inserted: number;
  duplicates: number;
  notified: number;
  notificationFailures: number;
  /** Records whose store write failed; the rest of the batch still ran. */
  errors: number;
  newListings: Listing[];
}

export interface IngestionPassResult {
  filters: FilterRunResult[];
  failedFilters: string[];
  inserted: number;
  elapsedMs: number;
}

export interface IngestionOptions {
  sourceTimeoutMs: number;
  /** When false, listings are recheck-eligible from insertion instead of from first notification. */
  requireNotifiedForRecheck: boolean;
  /** How long a timed-out scrape has to return the cards it already holds. */
  abortGraceMs?: number;
}

export interface IngestionDeps {
  store: ListingStore;
  source: ListingSource;
  notifier: Notifier;
  runLog: RunLog;
  filters: FilterSet;
  logger: Logger;
}

export class IngestionEngine {
  private readonly logger: Logger;
  private passRunning = false;

  constructor(
    private readonly deps: IngestionDeps,
    private readonly options: IngestionOptions,
  ) {
    this.logger = deps.logger.child({ component: 'ingestion' });
  }

  get running(): boolean {
    return this.passRunning;
  }

  /**
   * Scrape one filter and persist what is new.
   * Stored links are loaded before scraping so the source only enriches unknown cards;
   * each record is then checked again against the store before insert.
   */
  async runFilter(filterName: string, options?: { priority?: boolean }): Promise<FilterRunResult> {
    const filter = this.deps.filters.get(filterName);
    if (!filter) {
      throw new Error(`Unknown filter: ${filterName}`);
    }
    const priority = options?.priority ?? filter.priority;
    const { store, source } = this.deps;

    const known = await store.existingLinks(filterName);
    const records = await withDeadline(
      (signal) => source.scrape(filter, known, { signal }),
      this.options.sourceTimeoutMs,
      `Scrape ${filterName}`,
      this.options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS,
    );

    const result: FilterRunResult = {
      filterName,
      scraped: records.length,
      inserted: 0,
      duplicates: 0,
      notified: 0,
      notificationFailures: 0,
      errors: 0,
      newListings: [],
    };
    const seen = new Set<string>();

    for (const record of records) {
      if (seen.has(record.link)) {
        result.duplicates++;
        continue;
      }
      seen.add(record.link);

      try {
        if (await store.exists(record.link)) {
          result.duplicates++;
          continue;
        }

        const { listing, created } = await store.insert({
          ...record,
          filterName,
          eligibleForRecheck: !this.options.requireNotifiedForRecheck,
        });
        if (!created) {
          result.duplicates++;
          continue;
        }

        result.inserted++;
        result.newListings.push(listing);

        if (await this.notifyNew(listing, priority)) {
          await store.markNotified(listing.id);
          result.notified++;
        } else {
          result.notificationFailures++;
        }
      } catch (err) {
        result.errors++;
        this.logger.error({ err, link: record.link, filter: filterName }, 'Error ingesting record; continuing');
      }
    }

    this.logger.info(
      {
        filter: filterName,
        scraped: result.scraped,
        inserted: result.inserted,
        duplicates: result.duplicates,
        notificationFailures: result.notificationFailures,
        errors: result.errors,
      },
      'Filter ingestion complete',
    );

    return result;
  }

  /**
   * Every filter, priority filters first. One filter failing does not stop the pass.
   */
  async runAll(): Promise<IngestionPassResult> {
    if (this.passRunning) throw new TaskInProgressError('Ingestion pass');
    this.passRunning = true;
    try {
      return await this.executePass();
    } finally {
      this.passRunning = false;
    }
  }

  private async executePass(): Promise<IngestionPassResult> {
    const { runLog, notifier } = this.deps;
    const startedAt = Date.now();
    const runId = await runLog.start('ingestion');

    const ordered = orderFilters(this.deps.filters);
    const priorityFilters = ordered.filter((f) => f.priority);
    const regularFilters = ordered.filter((f) => !f.priority);

    const results: FilterRunResult[] = [];
    const failedFilters: string[] = [];

    const runGroup = async (group: FilterDefinition[]): Promise<Listing[]> => {
      const fresh: Listing[] = [];
      for (const filter of group) {
        try {
          const result = await this.runFilter(filter.name, { priority: filter.priority });
          results.push(result);
          fresh.push(...result.newListings);
        } catch (err) {
          failedFilters.push(filter.name);
          this.logger.error({ err, filter: filter.name }, 'Filter ingestion failed; continuing with next filter');
        }
      }
      return fresh;
    };

    const priorityListings = await runGroup(priorityFilters);
    if (priorityListings.length > 0) {
      try {
        await notifier.priorityDigest(priorityListings);
      } catch (err) {
        this.logger.error({ err, count: priorityListings.length }, 'Priority digest notification failed');
      }
    }
    await runGroup(regularFilters);

    const inserted = results.reduce((sum, r) => sum + r.inserted, 0);
    const elapsedMs = Date.now() - startedAt;
    const status = failedFilters.length === 0 ? 'completed'
      : failedFilters.length === ordered.length ? 'failed'
      : 'partial';

    await runLog.finish(
      runId,
      status,
      {
        inserted,
        elapsedMs,
        failedFilters,
        filters: results.map(({ newListings: _newListings, ...counts }) => counts),
      },
      failedFilters.length > 0 ? `Failed filters: ${failedFilters.join(', ')}` : undefined,
    );

    this.logger.info({ inserted, failedFilters, elapsedMs, status }, 'Ingestion pass complete');
    return { filters: results, failedFilters, inserted, elapsedMs };
  }

  /** true when delivered. The listing stays stored either way. */
  private async notifyNew(listing: Listing, priority: boolean): Promise<boolean> {
    try {
      await this.deps.notifier.newListing(listing, { priority });
      return true;
    } catch (err) {
      this.logger.error({ err, listingId: listing.id }, 'New listing notification failed');
      await this.deps.notifier.error('New listing notification failed', {
        listingId: listing.id,
        link: listing.link,
        error: describeError(err),
      });
      return false;
    }
  }
}
