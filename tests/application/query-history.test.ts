import { describe, it, expect, vi, beforeEach } from 'vitest';
import { listHistory, type AuditLog } from '../../src/application/index.js';
import { memoryAudit } from '../helpers.js';

describe('listHistory', () => {
  let audit: AuditLog;

  beforeEach(async () => {
    ({ audit } = await memoryAudit());
  });

  // --- limit clamping ---

  it('uses limit=50 when omitted', async () => {
    const getHistory = vi.spyOn(audit, 'getHistory');

    const result = await listHistory(audit, 'cli_history', {});

    expect(getHistory).toHaveBeenCalledWith('cli_history', 50, {});
    expect(result).toEqual({ data: [], pagination: { limit: 50, count: 0 } });
  });

  it('clamps limit=0 up to 1', async () => {
    const result = await listHistory(audit, 'cli_history', { limit: 0 });

    expect(result.pagination.limit).toBe(1);
  });

  it('clamps limit=9999 down to 500', async () => {
    const result = await listHistory(audit, 'cli_history', { limit: 9999 });

    expect(result.pagination.limit).toBe(500);
  });

  // --- filtering ---

  it('filters on success when asked', async () => {
    await audit.logCliCommand({ command: 'ok' });
    await audit.logCliCommand({ command: 'broken', success: false, error: 'bad' });

    const failed = await listHistory(audit, 'cli_history', { success: false });
    const succeeded = await listHistory(audit, 'cli_history', { success: true });

    expect(failed.data.map((record) => record['command'])).toEqual(['broken']);
    expect(succeeded.data.map((record) => record['command'])).toEqual(['ok']);
    expect(failed.pagination.count).toBe(1);
  });
});
