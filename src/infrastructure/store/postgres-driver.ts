import { randomUUID } from 'node:crypto';
import { and, asc, eq, sql as raw, type SQL } from 'drizzle-orm';
import type { DbClient } from '../db/index.js';
import { records, type RecordRow } from '../db/index.js';
import type {
  Document,
  DocumentDriver,
  FindOptions,
  SortSpec,
  StoredDocument,
} from './document-driver.js';

/**
 * Document driver over a single Postgres table with a JSONB body.
 *
 * Filters use JSONB containment (`document @> filter`), which gives the
 * same partial-match semantics as the in-memory driver. Sorting on
 * `timestamp` or `updated_at` uses the dedicated columns; any other
 * field sorts on its JSONB value, so numbers compare numerically.
 */
export class PostgresDocumentDriver implements DocumentDriver {
  private schemaReady = false;

  constructor(private readonly client: DbClient) {}

  async ping(): Promise<void> {
    await this.client.sql`SELECT 1`;
    if (!this.schemaReady) {
      await ensureSchema(this.client);
      this.schemaReady = true;
    }
  }

  async insert(collection: string, documents: readonly Document[]): Promise<string[]> {
    if (documents.length === 0) return [];

    const rows = documents.map((document) => ({
      id: randomUUID(),
      collection,
      document,
      timestamp: timestampOf(document['timestamp']),
    }));

    await this.client.db.insert(records).values(rows);
    return rows.map((row) => row.id);
  }

  async find(collection: string, filter: Document, options: FindOptions): Promise<StoredDocument[]> {
    const query = this.client.db
      .select()
      .from(records)
      .where(whereClause(collection, filter))
      .orderBy(...orderBy(options.sort))
      .$dynamic();

    const rows = options.limit !== undefined ? await query.limit(options.limit) : await query;
    return rows.map(toStoredDocument);
  }

  async updateOne(collection: string, filter: Document, set: Document): Promise<boolean> {
    const [target] = await this.client.db
      .select({ id: records.id })
      .from(records)
      .where(whereClause(collection, filter))
      .orderBy(asc(records.timestamp))
      .limit(1);

    if (target === undefined) return false;

    const updatedAt = set['updated_at'] instanceof Date ? set['updated_at'] : new Date();
    const rows = await this.client.db
      .update(records)
      .set({
        document: raw`${records.document} || ${JSON.stringify(set)}::jsonb`,
        updated_at: updatedAt,
      })
      .where(eq(records.id, target.id))
      .returning({ id: records.id });

    return rows.length > 0;
  }

  async close(): Promise<void> {
    await this.client.sql.end();
  }
}

/**
 * Creates the table and its indexes if missing.
 * drizzle-kit migrations produce the same DDL from `schema.ts`.
 */
async function ensureSchema(client: DbClient): Promise<void> {
  await client.sql.unsafe(`
    CREATE TABLE IF NOT EXISTS records (
      id          UUID PRIMARY KEY,
      collection  VARCHAR(255) NOT NULL,
      document    JSONB        NOT NULL DEFAULT '{}',
      timestamp   TIMESTAMPTZ  NOT NULL,
      updated_at  TIMESTAMPTZ
    )
  `);
  await client.sql.unsafe(
    'CREATE INDEX IF NOT EXISTS idx_records_collection_timestamp ON records (collection, timestamp)',
  );
  await client.sql.unsafe(
    'CREATE INDEX IF NOT EXISTS idx_records_document ON records USING gin (document)',
  );
}

function whereClause(collection: string, filter: Document): SQL | undefined {
  const conditions: SQL[] = [eq(records.collection, collection)];
  if (Object.keys(filter).length > 0) {
    conditions.push(raw`${records.document} @> ${JSON.stringify(filter)}::jsonb`);
  }
  return and(...conditions);
}

function orderBy(sort: SortSpec | undefined): SQL[] {
  if (sort === undefined || sort.length === 0) {
    return [asc(records.timestamp)];
  }

  return sort.map(([field, direction]) => {
    const target = field === 'timestamp'
      ? records.timestamp
      : field === 'updated_at'
        ? records.updated_at
        : raw`(${records.document} -> ${field}::text)`;
    return direction === -1 ? raw`${target} DESC NULLS LAST` : raw`${target} ASC NULLS LAST`;
  });
}

function timestampOf(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    if (Number.isFinite(parsed.getTime())) return parsed;
  }
  return new Date();
}

function toStoredDocument(row: RecordRow): StoredDocument {
  return {
    ...row.document,
    _id: row.id,
    timestamp: row.timestamp,
    ...(row.updated_at !== null ? { updated_at: row.updated_at } : {}),
  };
}
