import { and, asc, desc, eq, gt, gte, inArray, isNotNull, isNull, lt, or, sql } from 'drizzle-orm';
import type { Database } from '../db/connection.js';
import { listings } from '../db/schema/index.js';
import type { Logger } from '../lib/logger.js';
import {
  changeSet,
  type ChangesSummary,
  type InsertResult,
  type Listing,
  type ListingStore,
  type NewListing,
  type RecheckSelectionOptions,
  type RecordedChanges,
} from './listing-store.js';

/**
 * Staleness selection as a query builder, so the generated SQL can be inspected.
 */
export function buildRecheckQuery(
  db: Database,
  cutoff: Date,
  limit: number,
  options: RecheckSelectionOptions,
) {
  const stale = or(isNull(listings.lastCheckedAt), lt(listings.lastCheckedAt, cutoff));
  const reachable = options.unavailableSince
    ? or(eq(listings.isAvailable, true), gt(listings.unavailableAt, options.unavailableSince))
    : undefined;

  return db
    .select()
    .from(listings)
    .where(and(eq(listings.eligibleForRecheck, true), stale, reachable))
    .orderBy(sql`${listings.lastCheckedAt} asc nulls first`, asc(listings.id))
    .limit(limit);
}

/**
 * Insert that leaves an already stored link alone; an empty returning set means the link was taken.
 */
export function buildInsertQuery(db: Database, listing: NewListing, now: Date) {
  return db
    .insert(listings)
    .values({
      link: listing.link,
      title: listing.title,
      brand: listing.brand,
      year: listing.year,
      mileage: listing.mileage,
      features: listing.features,
      description: listing.description,
      price: listing.price,
      datePosted: listing.datePosted,
      place: listing.place,
      filterName: listing.filterName,
      eligibleForRecheck: listing.eligibleForRecheck,
      createdAt: now,
      updatedAt: now,
    })
    .onConflictDoNothing({ target: listings.link })
    .returning();
}

export function buildTouchQuery(db: Database, id: number, at: Date) {
  return db
    .update(listings)
    .set({
      // greatest() skips NULL, so a first check takes `at`
      lastCheckedAt: sql`greatest(${listings.lastCheckedAt}, ${at})`,
      isAvailable: true,
      unavailableAt: null,
      updatedAt: at,
    })
    .where(eq(listings.id, id));
}

/** Keeps the first unavailability time across repeated misses. */
export function buildMarkUnavailableQuery(db: Database, id: number, at: Date) {
  return db
    .update(listings)
    .set({
      isAvailable: false,
      unavailableAt: sql`coalesce(${listings.unavailableAt}, ${at})`,
      lastCheckedAt: sql`greatest(${listings.lastCheckedAt}, ${at})`,
      updatedAt: at,
    })
    .where(eq(listings.id, id));
}

export class DrizzleListingStore implements ListingStore {
  constructor(
    private readonly db: Database,
    private readonly logger: Logger,
  ) {}

  async exists(link: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: listings.id })
      .from(listings)
      .where(eq(listings.link, link))
      .limit(1);
    return rows.length > 0;
  }

  async existingLinks(filterName: string): Promise<Set<string>> {
    const rows = await this.db
      .select({ link: listings.link })
      .from(listings)
      .where(eq(listings.filterName, filterName));
    return new Set(rows.map((r) => r.link));
  }

  async insert(listing: NewListing): Promise<InsertResult> {
    const inserted = await buildInsertQuery(this.db, listing, new Date());

    if (inserted.length > 0) {
      return { listing: inserted[0], created: true };
    }

    // Lost a race on the unique link: the stored row wins
    const [existing] = await this.db.select().from(listings).where(eq(listings.link, listing.link)).limit(1);
    if (!existing) {
      throw new Error(`Insert of ${listing.link} conflicted but no stored row was found`);
    }
    this.logger.debug({ link: listing.link, id: existing.id }, 'Insert skipped: link already stored');
    return { listing: existing, created: false };
  }

  async markNotified(id: number): Promise<void> {
    await this.db
      .update(listings)
      .set({ notified: true, eligibleForRecheck: true, updatedAt: new Date() })
      .where(eq(listings.id, id));
  }

  async listingsNeedingRecheck(
    cutoff: Date,
    limit: number,
    options: RecheckSelectionOptions,
  ): Promise<Listing[]> {
    return buildRecheckQuery(this.db, cutoff, limit, options);
  }

  async getByIds(ids: readonly number[]): Promise<Listing[]> {
    if (ids.length === 0) return [];
    return this.db
      .select()
      .from(listings)
      .where(inArray(listings.id, [...ids]))
      .orderBy(asc(listings.id));
  }

  async recordChanges(id: number, changes: RecordedChanges, at: Date): Promise<Listing | null> {
    return this.db.transaction(async (tx) => {
      const [current] = await tx.select().from(listings).where(eq(listings.id, id)).for('update');
      if (!current) return null;

      const [updated] = await tx
        .update(listings)
        .set(changeSet(current, changes, at))
        .where(eq(listings.id, id))
        .returning();
      return updated ?? null;
    });
  }

  async touchLastChecked(id: number, at: Date): Promise<void> {
    await buildTouchQuery(this.db, id, at);
  }

  async markUnavailable(id: number, at: Date): Promise<void> {
    await buildMarkUnavailableQuery(this.db, id, at);
  }

  // ─── Reporting ─────────────────────────────────────────────────────────────

  async priceChangesSince(since: Date): Promise<Listing[]> {
    return this.db
      .select()
      .from(listings)
      .where(and(gte(listings.priceChangedAt, since), isNotNull(listings.previousPrice)))
      .orderBy(desc(listings.priceChangedAt));
  }

  async descriptionChangesSince(since: Date): Promise<Listing[]> {
    return this.db
      .select()
      .from(listings)
      .where(gte(listings.descriptionChangedAt, since))
      .orderBy(desc(listings.descriptionChangedAt));
  }

  async neverChecked(limit: number): Promise<Listing[]> {
    return this.db
      .select()
      .from(listings)
      .where(isNull(listings.lastCheckedAt))
      .orderBy(desc(listings.createdAt))
      .limit(limit);
  }

  async changesSummary(since: Date): Promise<ChangesSummary> {
    const [row] = await this.db
      .select({
        priceChanges: sql<number>`count(*) filter (where ${listings.priceChangedAt} >= ${since})::int`,
        descriptionChanges: sql<number>`count(*) filter (where ${listings.descriptionChangedAt} >= ${since})::int`,
        neverChecked: sql<number>`count(*) filter (where ${listings.lastCheckedAt} is null)::int`,
        unavailable: sql<number>`count(*) filter (where ${listings.isAvailable} = false)::int`,
        total: sql<number>`count(*)::int`,
      })
      .from(listings);

    return row ?? { priceChanges: 0, descriptionChanges: 0, neverChecked: 0, unavailable: 0, total: 0 };
  }
}
