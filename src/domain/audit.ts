/**
 * Audit record taxonomy.
 *
 * Each logging operation writes one record with a fixed `type` tag into its
 * own logical collection. Collection names are durable keys: stored history
 * is looked up by them, so they never change.
 */

export const AUDIT_COLLECTIONS = {
  cli_command: 'cli_history',
  trade_operation: 'trade_history',
  market_creation: 'market_creation_history',
  llm_query: 'llm_history',
  market_query: 'market_query_history',
  rag_operation: 'rag_history',
  news_query: 'news_query_history',
} as const;

export type AuditRecordType = keyof typeof AUDIT_COLLECTIONS;

export type AuditCollection = (typeof AUDIT_COLLECTIONS)[AuditRecordType];

export const AUDIT_COLLECTION_NAMES: readonly AuditCollection[] = Object.values(AUDIT_COLLECTIONS);

export function isAuditCollection(value: string): value is AuditCollection {
  return AUDIT_COLLECTION_NAMES.some((name) => name === value);
}

/** JSON-compatible value produced by payload normalization. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };
