import { randomUUID } from 'node:crypto';
import type {
  Document,
  DocumentDriver,
  FindOptions,
  SortSpec,
  StoredDocument,
} from './document-driver.js';

/**
 * In-process document driver.
 *
 * Used by tests and by `STORE_DRIVER=memory` for local runs without
 * Postgres. Documents are cloned on the way in and out so callers can
 * never mutate what has been stored.
 */
export class MemoryDocumentDriver implements DocumentDriver {
  private readonly collections: Map<string, StoredDocument[]> = new Map();
  private available = true;

  async ping(): Promise<void> {
    if (!this.available) {
      throw new Error('Memory store is offline');
    }
  }

  async insert(collection: string, documents: readonly Document[]): Promise<string[]> {
    const rows = this.collections.get(collection) ?? [];
    const ids: string[] = [];
    for (const document of documents) {
      const id = randomUUID();
      rows.push({ ...structuredClone(document), _id: id });
      ids.push(id);
    }
    this.collections.set(collection, rows);
    return ids;
  }

  async find(collection: string, filter: Document, options: FindOptions): Promise<StoredDocument[]> {
    const rows = (this.collections.get(collection) ?? []).filter((row) => contains(row, filter));
    const sorted = options.sort ? sortDocuments(rows, options.sort) : rows;
    const limited = options.limit !== undefined ? sorted.slice(0, options.limit) : sorted;
    return limited.map((row) => structuredClone(row));
  }

  async updateOne(collection: string, filter: Document, set: Document): Promise<boolean> {
    const rows = this.collections.get(collection) ?? [];
    const index = rows.findIndex((row) => contains(row, filter));
    const current = rows[index];
    if (current === undefined) return false;
    rows[index] = { ...current, ...structuredClone(set), _id: current._id };
    return true;
  }

  async close(): Promise<void> {
    this.available = false;
  }

  /** Simulates the backend going away or coming back. */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Number of stored documents in a collection. */
  count(collection: string): number {
    return this.collections.get(collection)?.length ?? 0;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** Containment check mirroring Postgres `jsonb @>` semantics. */
export function contains(actual: unknown, expected: unknown): boolean {
  if (expected instanceof Date) {
    return actual instanceof Date && actual.getTime() === expected.getTime();
  }
  if (Array.isArray(expected)) {
    return Array.isArray(actual)
      && expected.every((item) => actual.some((candidate) => contains(candidate, item)));
  }
  if (isPlainObject(expected)) {
    return isPlainObject(actual)
      && Object.entries(expected).every(([key, value]) => contains(actual[key], value));
  }
  return actual === expected;
}

/** JSONB type order: null < string < number < boolean < array < object. */
function typeRank(value: unknown): number {
  if (value === null) return 0;
  if (typeof value === 'string' || value instanceof Date) return 1;
  if (typeof value === 'number') return 2;
  if (typeof value === 'boolean') return 3;
  if (Array.isArray(value)) return 4;
  return 5;
}

function compareValues(a: unknown, b: unknown): number {
  const rankDiff = typeRank(a) - typeRank(b);
  if (rankDiff !== 0) return Math.sign(rankDiff);

  if (typeof a === 'number' && typeof b === 'number') return Math.sign(a - b);
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);

  const left = textOf(a);
  const right = textOf(b);
  if (left === null || right === null || left === right) return 0;
  return left < right ? -1 : 1;
}

function textOf(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return Number.isFinite(value.getTime()) ? value.toISOString() : String(value);
  return null;
}

function sortDocuments(rows: StoredDocument[], sort: SortSpec): StoredDocument[] {
  return [...rows].sort((a, b) => {
    for (const [field, direction] of sort) {
      const left = a[field];
      const right = b[field];
      // Missing fields sort last regardless of direction
      if (left === undefined || right === undefined) {
        if (left !== right) return left === undefined ? 1 : -1;
        continue;
      }
      const result = compareValues(left, right);
      if (result !== 0) return result * direction;
    }
    return 0;
  });
}
