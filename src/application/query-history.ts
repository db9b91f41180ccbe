import type { AuditCollection } from '../domain/index.js';
import type { AuditLog } from './audit-log.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export interface ListHistoryParams {
  limit?: number;
  /** Restrict to successful (`true`) or failed (`false`) records. */
  success?: boolean;
}

/**
 * Use case: read back an audit collection, most recent first.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function listHistory(
  audit: AuditLog,
  collection: AuditCollection,
  params: ListHistoryParams,
) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const filter = params.success !== undefined ? { success: params.success } : {};

  const data = await audit.getHistory(collection, limit, filter);

  return {
    data,
    pagination: { limit, count: data.length },
  };
}
