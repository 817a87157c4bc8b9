import { TaskInProgressError, describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { Price, normalizeText } from '../lib/price.js';
import { sleep, withDeadline } from '../lib/timeout.js';
import type { Notifier } from '../notifications/notifier.js';
import type { ListingSource, RefetchResult } from '../source/listing-source.js';
import type { Listing, ListingStore } from '../store/listing-store.js';
import type { RunLog } from '../store/run-log.js';

const HOUR_MS = 3_600_000;

export interface FieldChange {
  old: string | null;
  new: string;
}

export interface ListingChange {
  price?: FieldChange;
  description?: FieldChange;
}

export type ChangeClassification =
  | { kind: 'unavailable' }
  | ({ kind: 'changed' } & ListingChange)
  | { kind: 'unchanged' };

export type CheckOutcome =
  | { listingId: number; kind: 'unchanged' }
  | { listingId: number; kind: 'changed'; change: ListingChange; notificationFailed: boolean }
  | { listingId: number; kind: 'unavailable' }
  | { listingId: number; kind: 'error'; error: string };

export interface RecheckSummary {
  checked: number;
  changed: number;
  priceChanges: number;
  descriptionChanges: number;
  unavailable: number;
  errors: number;
  notificationFailures: number;
  elapsedMs: number;
}

export interface TargetedRecheckResult {
  outcomes: CheckOutcome[];
  /** Requested ids with no stored listing. */
  missing: number[];
  summary: RecheckSummary;
}

export interface ChangeDetectionOptions {
  stalenessHours: number;
  batchSize: number;
  batchPauseMs: number;
  limit: number;
  /** 0 keeps rechecking unavailable listings forever. */
  unavailableRetentionHours: number;
  sourceTimeoutMs: number;
  now?: () => Date;
  pause?: (ms: number) => Promise<void>;
}

export interface ChangeDetectionDeps {
  store: ListingStore;
  source: ListingSource;
  notifier: Notifier;
  runLog: RunLog;
  logger: Logger;
}

/**
 * What a refetch means for a stored listing. Values are compared after trimming;
 * an empty fetched price or description carries no information and never counts as a change.
 */
export function classify(listing: Pick<Listing, 'price' | 'description'>, result: RefetchResult): ChangeClassification {
  if (result.kind === 'not_found') return { kind: 'unavailable' };

  const change: ListingChange = {};

  const fetchedPrice = Price.of(result.snapshot.price);
  const storedPrice = Price.of(listing.price);
  if (fetchedPrice.display !== null && !fetchedPrice.equals(storedPrice)) {
    change.price = { old: storedPrice.display, new: fetchedPrice.display };
  }

  const fetchedDescription = normalizeText(result.snapshot.description);
  const storedDescription = normalizeText(listing.description);
  if (fetchedDescription !== null && fetchedDescription !== storedDescription) {
    change.description = { old: storedDescription, new: fetchedDescription };
  }

  return change.price || change.description ? { kind: 'changed', ...change } : { kind: 'unchanged' };
}

export function summarizeOutcomes(outcomes: readonly CheckOutcome[], elapsedMs: number): RecheckSummary {
  const summary: RecheckSummary = {
    checked: outcomes.length,
    changed: 0,
    priceChanges: 0,
    descriptionChanges: 0,
    unavailable: 0,
    errors: 0,
    notificationFailures: 0,
    elapsedMs,
  };

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'changed':
        summary.changed++;
        if (outcome.change.price) summary.priceChanges++;
        if (outcome.change.description) summary.descriptionChanges++;
        if (outcome.notificationFailed) summary.notificationFailures++;
        break;
      case 'unavailable':
        summary.unavailable++;
        break;
      case 'error':
        summary.errors++;
        break;
      case 'unchanged':
        break;
    }
  }

  return summary;
}

export class ChangeDetectionEngine {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly pause: (ms: number) => Promise<void>;
  private passRunning = false;

  constructor(
    private readonly deps: ChangeDetectionDeps,
    private readonly options: ChangeDetectionOptions,
  ) {
    this.logger = deps.logger.child({ component: 'change-detection' });
    this.now = options.now ?? (() => new Date());
    this.pause = options.pause ?? sleep;
  }

  get running(): boolean {
    return this.passRunning;
  }

  /**
   * Refetch one listing and record what changed. Never throws: failures come back as
   * an `error` outcome and leave `last_checked_at` alone so the next pass retries.
   */
  async checkListing(listing: Listing): Promise<CheckOutcome> {
    const { store, source } = this.deps;
    const listingId = listing.id;

    let result: RefetchResult;
    try {
      result = await withDeadline(
        (signal) => source.refetch(listing.link, { signal }),
        this.options.sourceTimeoutMs,
        `Refetch ${listing.link}`,
        0,
      );
    } catch (err) {
      this.logger.warn({ listingId, link: listing.link, err: describeError(err) }, 'Refetch failed');
      return { listingId, kind: 'error', error: describeError(err) };
    }

    const classification = classify(listing, result);
    const at = this.now();

    try {
      switch (classification.kind) {
        case 'unavailable':
          await store.markUnavailable(listingId, at);
          this.logger.info({ listingId, link: listing.link }, 'Listing no longer available');
          return { listingId, kind: 'unavailable' };

        case 'unchanged':
          await store.touchLastChecked(listingId, at);
          return { listingId, kind: 'unchanged' };

        case 'changed': {
          const change: ListingChange = {};
          if (classification.price) change.price = classification.price;
          if (classification.description) change.description = classification.description;

          const updated = await store.recordChanges(
            listingId,
            { price: change.price?.new, description: change.description?.new },
            at,
          );
          if (!updated) {
            throw new Error(`Listing ${listingId} disappeared from the store during recheck`);
          }

          this.logger.info(
            { listingId, price: change.price, descriptionChanged: Boolean(change.description) },
            'Listing change recorded',
          );

          const notificationFailed = !(await this.notifyChange(updated, change));
          return { listingId, kind: 'changed', change, notificationFailed };
        }
      }
    } catch (err) {
      this.logger.error({ err, listingId }, 'Recording recheck result failed');
      return { listingId, kind: 'error', error: describeError(err) };
    }
  }

  /**
   * The daily pass: stale listings, never-checked first, in paced batches.
   */
  async runScheduledPass(): Promise<RecheckSummary> {
    if (this.passRunning) throw new TaskInProgressError('Recheck pass');
    this.passRunning = true;
    try {
      return await this.executePass();
    } finally {
      this.passRunning = false;
    }
  }

  /**
   * On-demand recheck of specific listings, bypassing the staleness selection.
   */
  async recheckListings(ids: readonly number[]): Promise<TargetedRecheckResult> {
    const startedAt = this.now().getTime();
    const unique = [...new Set(ids)];
    const found = await this.deps.store.getByIds(unique);
    const foundIds = new Set(found.map((l) => l.id));
    const missing = unique.filter((id) => !foundIds.has(id));

    this.logger.info({ requested: unique.length, found: found.length, missing }, 'Starting targeted recheck');

    const outcomes = await this.processInBatches(found);
    return { outcomes, missing, summary: summarizeOutcomes(outcomes, this.now().getTime() - startedAt) };
  }

  /** What the next scheduled pass would select right now, in selection order. */
  async dueListings(): Promise<Listing[]> {
    const { cutoff, unavailableSince } = this.selectionBounds(this.now().getTime());
    return this.deps.store.listingsNeedingRecheck(cutoff, this.options.limit, { unavailableSince });
  }

  private selectionBounds(at: number): { cutoff: Date; unavailableSince: Date | null } {
    return {
      cutoff: new Date(at - this.options.stalenessHours * HOUR_MS),
      unavailableSince: this.options.unavailableRetentionHours > 0
        ? new Date(at - this.options.unavailableRetentionHours * HOUR_MS)
        : null,
    };
  }

  private async executePass(): Promise<RecheckSummary> {
    const { store, notifier, runLog } = this.deps;
    const startedAt = this.now().getTime();
    const runId = await runLog.start('recheck');

    try {
      const { cutoff, unavailableSince } = this.selectionBounds(startedAt);
      const due = await store.listingsNeedingRecheck(cutoff, this.options.limit, { unavailableSince });

      if (due.length === 0) {
        const empty = summarizeOutcomes([], this.now().getTime() - startedAt);
        this.logger.info({ cutoff: cutoff.toISOString() }, 'No listings due for recheck');
        await runLog.finish(runId, 'completed', { ...empty });
        return empty;
      }

      this.logger.info(
        { due: due.length, cutoff: cutoff.toISOString(), batchSize: this.options.batchSize },
        'Starting recheck pass',
      );

      const outcomes = await this.processInBatches(due);
      const summary = summarizeOutcomes(outcomes, this.now().getTime() - startedAt);

      try {
        await notifier.recheckSummary(summary);
      } catch (err) {
        summary.notificationFailures++;
        this.logger.error({ err }, 'Recheck summary notification failed');
      }

      const status = summary.errors === 0 ? 'completed'
        : summary.errors === summary.checked ? 'failed'
        : 'partial';
      await runLog.finish(runId, status, { ...summary });

      this.logger.info({ ...summary, status }, 'Recheck pass complete');
      return summary;
    } catch (err) {
      this.logger.error({ err }, 'Recheck pass failed');
      await notifier.error('Recheck pass failed', { error: describeError(err) });
      await runLog.finish(runId, 'failed', {}, describeError(err));
      throw err;
    }
  }

  private async processInBatches(listings: readonly Listing[]): Promise<CheckOutcome[]> {
    const outcomes: CheckOutcome[] = [];
    const { batchSize, batchPauseMs } = this.options;

    for (let start = 0; start < listings.length; start += batchSize) {
      const batch = listings.slice(start, start + batchSize);
      for (const listing of batch) {
        outcomes.push(await this.checkListing(listing));
      }

      this.logger.debug(
        { processed: Math.min(start + batchSize, listings.length), total: listings.length },
        'Recheck batch processed',
      );

      if (start + batchSize < listings.length && batchPauseMs > 0) {
        await this.pause(batchPauseMs);
      }
    }

    return outcomes;
  }

  /** true when delivered. */
  private async notifyChange(listing: Listing, change: ListingChange): Promise<boolean> {
    try {
      await this.deps.notifier.listingChanged(listing, change);
      return true;
    } catch (err) {
      this.logger.error({ err, listingId: listing.id }, 'Change notification failed');
      await this.deps.notifier.error('Change notification failed', {
        listingId: listing.id,
        error: describeError(err),
      });
      return false;
    }
  }
}
