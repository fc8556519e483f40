import { pgTable, uuid, text, varchar, timestamp, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';

export const listings = pgTable(
  'listings',
  {
    id: uuid().primaryKey().defaultRandom(),
    indexName: varchar('index_name', { length: 100 }).notNull(),
    dataset: varchar({ length: 100 }).notNull(),
    identifier: varchar({ length: 255 }).notNull(),
    listingCategory: varchar('listing_category', { length: 50 }),
    sourceUrl: text('source_url').notNull(),
    detailUrl: text('detail_url'),
    postedAtRaw: text('posted_at_raw'),
    postedAtIso: varchar('posted_at_iso', { length: 40 }),
    extractedAtIso: varchar('extracted_at_iso', { length: 40 }).notNull(),
    enrichment: varchar({ length: 20 }).default('none').notNull(),
    fields: jsonb().$type<Record<string, unknown>>().notNull(),
    contentHash: varchar('content_hash', { length: 64 }).notNull(),
    firstSeenAt: timestamp('first_seen_at').defaultNow().notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => [
    uniqueIndex('uq_listings_index_dataset_identifier').on(t.indexName, t.dataset, t.identifier),
    index('idx_listings_dataset').on(t.dataset),
    index('idx_listings_posted_at_iso').on(t.postedAtIso),
    index('idx_listings_category').on(t.listingCategory),
  ],
);

export type ListingRow = typeof listings.$inferSelect;
export type NewListingRow = typeof listings.$inferInsert;
