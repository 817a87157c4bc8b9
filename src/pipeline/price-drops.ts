import { describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { Price } from '../lib/price.js';
import type { Notifier } from '../notifications/notifier.js';
import type { Listing, ListingStore } from '../store/listing-store.js';
import type { RunLog } from '../store/run-log.js';

const DAY_MS = 86_400_000;

export interface PriceDrop {
  listing: Listing;
  previousAmount: number;
  currentAmount: number;
  dropAmount: number;
  /** Relative to the previous price, one decimal. */
  dropPercent: number;
}

/**
 * Listings whose last recorded price change lowered the price by more than `thresholdEuros`,
 * largest drop first. Prices without digits are left out.
 */
export function findSignificantDrops(
  listings: readonly Listing[],
  options: { thresholdEuros: number },
): PriceDrop[] {
  const drops: PriceDrop[] = [];

  for (const listing of listings) {
    const previousAmount = Price.of(listing.previousPrice).amount;
    const currentAmount = Price.of(listing.price).amount;
    if (previousAmount === null || currentAmount === null || previousAmount <= 0) continue;

    const dropAmount = previousAmount - currentAmount;
    if (dropAmount <= options.thresholdEuros) continue;

    drops.push({
      listing,
      previousAmount,
      currentAmount,
      dropAmount,
      dropPercent: Math.round((dropAmount / previousAmount) * 1000) / 10,
    });
  }

  return drops.sort((a, b) => b.dropAmount - a.dropAmount);
}

export interface PriceDropReporterDeps {
  store: ListingStore;
  notifier: Notifier;
  runLog: RunLog;
  logger: Logger;
  now?: () => Date;
}

export class PriceDropReporter {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: PriceDropReporterDeps) {
    this.logger = deps.logger.child({ component: 'price-drops' });
    this.now = deps.now ?? (() => new Date());
  }

  async find(options: { lookbackDays: number; thresholdEuros: number }): Promise<PriceDrop[]> {
    const since = new Date(this.now().getTime() - options.lookbackDays * DAY_MS);
    const changed = await this.deps.store.priceChangesSince(since);
    return findSignificantDrops(changed, { thresholdEuros: options.thresholdEuros });
  }

  /**
   * Weekly alert: find drops and send them when there are any.
   */
  async run(options: { lookbackDays: number; thresholdEuros: number }): Promise<PriceDrop[]> {
    const { runLog, notifier } = this.deps;
    const runId = await runLog.start('price_drops');

    try {
      const drops = await this.find(options);
      if (drops.length > 0) {
        await notifier.priceDropAlert(drops, options.thresholdEuros);
      }

      await runLog.finish(runId, 'completed', { drops: drops.length, ...options });
      this.logger.info({ drops: drops.length, ...options }, 'Price drop report complete');
      return drops;
    } catch (err) {
      this.logger.error({ err }, 'Price drop report failed');
      await runLog.finish(runId, 'failed', { ...options }, describeError(err));
      throw err;
    }
  }
}
