import type { ListingRow } from '../db/schema/index.js';
import type { RawListing } from '../source/listing-source.js';

export type Listing = ListingRow;

export interface NewListing extends RawListing {
  filterName: string;
  /** Set when recheck eligibility does not wait for the first notification. */
  eligibleForRecheck: boolean;
}

export interface InsertResult {
  listing: Listing;
  /** false when the link was already stored; the existing row is returned. */
  created: boolean;
}

export interface RecheckSelectionOptions {
  /**
   * Unavailable listings are only selected when they went unavailable after this instant.
   * null keeps selecting them forever.
   */
  unavailableSince: Date | null;
}

/** Fetched values that differ from the stored ones. Absent fields are left alone. */
export interface RecordedChanges {
  price?: string;
  description?: string;
}

export function laterOf(current: Date | null, at: Date): Date {
  return current && current.getTime() > at.getTime() ? current : at;
}

/**
 * Column updates for a recheck that found changes: each changed field shifts its old value
 * into `previous_*` and bumps its counter, and the listing counts as checked and available.
 */
export function changeSet(current: Listing, changes: RecordedChanges, at: Date): Partial<Listing> {
  const update: Partial<Listing> = {
    lastCheckedAt: laterOf(current.lastCheckedAt, at),
    isAvailable: true,
    unavailableAt: null,
    updatedAt: at,
  };
  if (changes.price !== undefined) {
    update.previousPrice = current.price;
    update.price = changes.price;
    update.priceChangedAt = at;
    update.priceChangesCount = current.priceChangesCount + 1;
  }
  if (changes.description !== undefined) {
    update.previousDescription = current.description;
    update.description = changes.description;
    update.descriptionChangedAt = at;
    update.descriptionChangesCount = current.descriptionChangesCount + 1;
  }
  return update;
}

export interface ChangesSummary {
  priceChanges: number;
  descriptionChanges: number;
  neverChecked: number;
  unavailable: number;
  total: number;
}

export interface ListingStore {
  exists(link: string): Promise<boolean>;
  existingLinks(filterName: string): Promise<Set<string>>;
  insert(listing: NewListing): Promise<InsertResult>;
  /** Sets `notified` and makes the listing eligible for rechecks. */
  markNotified(id: number): Promise<void>;

  /**
   * Eligible listings never checked or last checked before `cutoff`:
   * never-checked first, then oldest check first, ties by id.
   */
  listingsNeedingRecheck(cutoff: Date, limit: number, options: RecheckSelectionOptions): Promise<Listing[]>;
  getByIds(ids: readonly number[]): Promise<Listing[]>;

  /**
   * Price and description changes of one recheck, committed together.
   * Returns the updated row, or null when the id is gone.
   */
  recordChanges(id: number, changes: RecordedChanges, at: Date): Promise<Listing | null>;
  touchLastChecked(id: number, at: Date): Promise<void>;
  markUnavailable(id: number, at: Date): Promise<void>;

  priceChangesSince(since: Date): Promise<Listing[]>;
  descriptionChangesSince(since: Date): Promise<Listing[]>;
  neverChecked(limit: number): Promise<Listing[]>;
  changesSummary(since: Date): Promise<ChangesSummary>;
}
