import { existsSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Logger } from 'pino';
import type { AuditLog } from './audit-log.js';
import { errorMessage } from './errors.js';

/**
 * Removes the locally cached candidate indexes so a run starts from a
 * clean retrieval state.
 *
 * Best-effort: a directory that cannot be removed is logged and recorded
 * as a failed `rag_operation`, and the remaining directories are still
 * attempted. Never rejects.
 */
export async function clearLocalCaches(
  dirs: readonly string[],
  deps: { log: Logger; audit: AuditLog },
): Promise<void> {
  for (const dir of dirs) {
    const target = resolve(dir);
    if (!existsSync(target)) continue;

    try {
      await rm(target, { recursive: true });
      deps.log.info({ dir }, 'Cleared local cache');
      await deps.audit.logRagOperation({
        operation_type: 'clear_local_cache',
        local_directory: dir,
      });
    } catch (err: unknown) {
      deps.log.warn({ err, dir }, 'Failed to clear local cache');
      await deps.audit.logRagOperation({
        operation_type: 'clear_local_cache',
        local_directory: dir,
        success: false,
        error: errorMessage(err),
      });
    }
  }
}
