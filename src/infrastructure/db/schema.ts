import { pgTable, uuid, varchar, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `records` table.
 *
 * One row per stored document. `collection` is the logical collection
 * name (`trade_history`, `cli_history`, ...) and `document` holds the
 * full JSON body. `timestamp` is lifted out of the document so history
 * reads can use an index for "most recent first".
 */
export const records = pgTable('records', {
  id: uuid('id').primaryKey(),
  collection: varchar('collection', { length: 255 }).notNull(),
  document: jsonb('document').$type<Record<string, unknown>>().notNull().default({}),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  updated_at: timestamp('updated_at', { withTimezone: true }),
}, (table) => [
  index('idx_records_collection_timestamp').on(table.collection, table.timestamp),
  index('idx_records_document').using('gin', table.document),
]);

export type RecordRow = typeof records.$inferSelect;
