import type { Logger } from '../lib/logger.js';
import type { ListingChange, RecheckSummary } from '../pipeline/change-detection.js';
import type { PriceDrop } from '../pipeline/price-drops.js';
import type { Listing } from '../store/listing-store.js';
import type { NewListingOptions, Notifier } from './notifier.js';

/**
 * Notifier used when no messaging channel is configured.
 */
export class LogNotifier implements Notifier {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'notifications' });
  }

  async newListing(listing: Listing, options: NewListingOptions): Promise<void> {
    this.logger.info(
      { listingId: listing.id, link: listing.link, price: listing.price, priority: options.priority },
      'New listing',
    );
  }

  async priorityDigest(listings: readonly Listing[]): Promise<void> {
    this.logger.info({ count: listings.length, ids: listings.map((l) => l.id) }, 'Priority digest');
  }

  async listingChanged(listing: Listing, change: ListingChange): Promise<void> {
    this.logger.info(
      { listingId: listing.id, price: change.price, descriptionChanged: Boolean(change.description) },
      'Listing changed',
    );
  }

  async recheckSummary(summary: RecheckSummary): Promise<void> {
    this.logger.info({ ...summary }, 'Recheck summary');
  }

  async priceDropAlert(drops: readonly PriceDrop[], thresholdEuros: number): Promise<void> {
    this.logger.info(
      {
        thresholdEuros,
        drops: drops.map((d) => ({ listingId: d.listing.id, dropAmount: d.dropAmount, dropPercent: d.dropPercent })),
      },
      'Price drops',
    );
  }

  async error(message: string, context?: Record<string, unknown>): Promise<void> {
    this.logger.error({ ...context }, message);
  }
}
