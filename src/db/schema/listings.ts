import {
  pgTable,
  serial,
  varchar,
  integer,
  boolean,
  text,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

// ─── Listings ────────────────────────────────────────────────────────────────

export const listings = pgTable(
  'listings',
  {
    id: serial('id').primaryKey(),
    // Canonical link, the only deduplication key
    link: varchar('link', { length: 500 }).notNull().unique(),

    // Descriptive attributes
    title: text('title').notNull(),
    brand: varchar('brand', { length: 50 }),
    year: integer('year'),
    mileage: integer('mileage'), // km
    features: text('features'),
    description: text('description'),
    price: varchar('price', { length: 100 }), // display string, parsed on demand
    datePosted: varchar('date_posted', { length: 100 }),
    place: varchar('place', { length: 200 }),
    filterName: varchar('filter_name', { length: 50 }),

    // Lifecycle flags
    notified: boolean('notified').notNull().default(false),
    eligibleForRecheck: boolean('eligible_for_recheck').notNull().default(false),
    isAvailable: boolean('is_available').notNull().default(true),
    unavailableAt: timestamp('unavailable_at', { withTimezone: true }),

    // Change tracking
    previousPrice: varchar('previous_price', { length: 100 }),
    previousDescription: text('previous_description'),
    priceChangedAt: timestamp('price_changed_at', { withTimezone: true }),
    descriptionChangedAt: timestamp('description_changed_at', { withTimezone: true }),
    priceChangesCount: integer('price_changes_count').notNull().default(0),
    descriptionChangesCount: integer('description_changes_count').notNull().default(0),
    lastCheckedAt: timestamp('last_checked_at', { withTimezone: true }),

    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_listings_brand').on(table.brand),
    index('idx_listings_filter_name').on(table.filterName),
    index('idx_listings_year').on(table.year),
    index('idx_listings_mileage').on(table.mileage),
    index('idx_listings_last_checked').on(table.lastCheckedAt),
    index('idx_listings_price_changed').on(table.priceChangedAt),
    index('idx_listings_description_changed').on(table.descriptionChangedAt),
  ],
);

export type ListingRow = typeof listings.$inferSelect;
export type NewListingRow = typeof listings.$inferInsert;
