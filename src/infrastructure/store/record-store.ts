import type { Logger } from 'pino';
import type {
  Document,
  DocumentDriver,
  FindOptions,
  StoredDocument,
  UpdateSpec,
} from './document-driver.js';

export interface RecordStoreOptions {
  log: Logger;
  /** Upper bound for every liveness check, in milliseconds. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Generic document store with silent degradation.
 *
 * A store that cannot reach its backend at connect time stays disabled:
 * writes resolve to `null`, reads to `[]`, updates to `false`. Every
 * operation re-checks liveness first, and any driver failure inside an
 * operation is logged and converted to the same sentinel. Nothing thrown
 * by the driver ever crosses this boundary.
 */
export class RecordStore {
  private readonly log: Logger;
  private readonly timeoutMs: number;
  private enabled = false;
  private closed = false;

  constructor(
    private readonly driver: DocumentDriver,
    options: RecordStoreOptions,
  ) {
    this.log = options.log;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Runs the bounded liveness check and enables the store on success.
   * Resolves to the resulting state; never rejects.
   */
  async connect(): Promise<boolean> {
    if (this.closed) return false;

    try {
      await withTimeout(this.driver.ping(), this.timeoutMs);
      this.enabled = true;
      this.log.info('Connected to record store');
    } catch (err: unknown) {
      this.enabled = false;
      this.log.error({ err }, 'Failed to connect to record store');
      this.log.warn('Record store operations will be disabled');
    }

    return this.enabled;
  }

  /** True when the store connected and the backend still answers. */
  async isConnected(): Promise<boolean> {
    if (!this.enabled) return false;

    try {
      await withTimeout(this.driver.ping(), this.timeoutMs);
      return true;
    } catch (err: unknown) {
      this.log.debug({ err }, 'Record store liveness check failed');
      return false;
    }
  }

  async insertOne(collection: string, document: Document): Promise<string | null> {
    if (!(await this.isConnected())) {
      this.log.warn({ collection }, 'Record store not connected, skipping insert');
      return null;
    }

    try {
      const [id] = await this.driver.insert(collection, [withTimestamp(document)]);
      this.log.debug({ collection, id }, 'Inserted document');
      return id ?? null;
    } catch (err: unknown) {
      this.log.error({ err, collection }, 'Error inserting document');
      return null;
    }
  }

  async insertMany(collection: string, documents: readonly Document[]): Promise<string[] | null> {
    if (!(await this.isConnected())) {
      this.log.warn({ collection }, 'Record store not connected, skipping insert');
      return null;
    }

    try {
      const ids = await this.driver.insert(collection, documents.map(withTimestamp));
      this.log.debug({ collection, count: ids.length }, 'Inserted documents');
      return ids;
    } catch (err: unknown) {
      this.log.error({ err, collection }, 'Error inserting documents');
      return null;
    }
  }

  async find(
    collection: string,
    filter: Document = {},
    options: FindOptions = {},
  ): Promise<StoredDocument[]> {
    if (!(await this.isConnected())) {
      this.log.warn({ collection }, 'Record store not connected, cannot query');
      return [];
    }

    try {
      return await this.driver.find(collection, filter, options);
    } catch (err: unknown) {
      this.log.error({ err, collection }, 'Error querying collection');
      return [];
    }
  }

  async findOne(collection: string, filter: Document = {}): Promise<StoredDocument | null> {
    if (!(await this.isConnected())) {
      this.log.warn({ collection }, 'Record store not connected, cannot query');
      return null;
    }

    try {
      const [first] = await this.driver.find(collection, filter, { limit: 1 });
      return first ?? null;
    } catch (err: unknown) {
      this.log.error({ err, collection }, 'Error querying collection');
      return null;
    }
  }

  /**
   * Applies `$set` to the first matching document, stamping `updated_at`.
   * Resolves true when a document was updated.
   */
  async updateOne(collection: string, filter: Document, update: UpdateSpec): Promise<boolean> {
    if (!(await this.isConnected())) {
      this.log.warn({ collection }, 'Record store not connected, cannot update');
      return false;
    }

    try {
      const set: Document = { ...update.$set, updated_at: new Date() };
      return await this.driver.updateOne(collection, filter, set);
    } catch (err: unknown) {
      this.log.error({ err, collection }, 'Error updating document');
      return false;
    }
  }

  /** Releases the backend. The store stays disabled afterwards. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const wasEnabled = this.enabled;
    this.enabled = false;

    try {
      await this.driver.close();
      if (wasEnabled) this.log.info('Record store connection closed');
    } catch (err: unknown) {
      this.log.warn({ err }, 'Error closing record store');
    }
  }
}

/**
 * Builds a store and runs its connect step before handing it out, so a
 * caller never sees a store in an undetermined state.
 */
export async function openRecordStore(
  driver: DocumentDriver,
  options: RecordStoreOptions,
): Promise<RecordStore> {
  const store = new RecordStore(driver, options);
  await store.connect();
  return store;
}

function withTimestamp(document: Document): Document {
  const timestamp = document['timestamp'];
  if (timestamp !== undefined && timestamp !== null) return { ...document };
  return { ...document, timestamp: new Date() };
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`Liveness check timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
