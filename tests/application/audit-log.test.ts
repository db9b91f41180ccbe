import { describe, it, expect, beforeEach } from 'vitest';
import type { AuditLog } from '../../src/application/index.js';
import type { MemoryDocumentDriver } from '../../src/infrastructure/store/index.js';
import { fakeLogger, fakeMarket, memoryAudit, range } from '../helpers.js';

const NOW = new Date('2026-04-01T12:00:00Z');

describe('AuditLog', () => {
  let audit: AuditLog;
  let driver: MemoryDocumentDriver;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(async () => {
    ({ audit, driver, log } = await memoryAudit({ now: () => NOW }));
  });

  // --- record shapes ---

  it('writes trade operations with counts and the market payload', async () => {
    const market = fakeMarket('m1', { spread: 0.02 });
    const id = await audit.logTradeOperation({
      operation_type: 'one_best_trade',
      market_id: 'm1',
      market_data: market,
      events_count: 10,
      filtered_events_count: 4,
      markets_count: 9,
      filtered_markets_count: 3,
      best_trade: 'buy yes at 0.5',
      amount: 12.5,
      attempt: 1,
    });

    const [record] = await audit.getHistory('trade_history');
    expect(record).toEqual({
      _id: id,
      type: 'trade_operation',
      operation_type: 'one_best_trade',
      market_id: 'm1',
      market_data: {
        id: 'm1',
        question: 'Will m1 happen?',
        outcomes: ['Yes', 'No'],
        outcome_prices: [0.5, 0.5],
        spread: 0.02,
      },
      events_count: 10,
      filtered_events_count: 4,
      markets_count: 9,
      filtered_markets_count: 3,
      best_trade: 'buy yes at 0.5',
      amount: 12.5,
      attempt: 1,
      success: true,
      timestamp: NOW,
    });
  });

  it('stores unset fields as null and omits the payloads', async () => {
    await audit.logTradeOperation({ operation_type: 'one_best_trade', success: false, error: 'boom' });

    const [record] = await audit.getHistory('trade_history');
    expect(record).toMatchObject({
      market_id: null,
      events_count: null,
      best_trade: null,
      amount: null,
      success: false,
      error: 'boom',
    });
    expect(record).not.toHaveProperty('market_data');
    expect(record).not.toHaveProperty('attempt');
    expect(record).not.toHaveProperty('retries_exhausted');
  });

  it('marks the record that ends a retry sequence', async () => {
    await audit.logMarketCreation({ success: false, error: 'down', attempt: 5, retries_exhausted: true });

    const [record] = await audit.getHistory('market_creation_history');
    expect(record).toMatchObject({
      type: 'market_creation',
      market_description: null,
      attempt: 5,
      retries_exhausted: true,
    });
  });

  it('omits an empty error message', async () => {
    await audit.logLlmQuery({ query_type: 'filter_events', user_input: '3 events', success: false, error: '' });

    const [record] = await audit.getHistory('llm_history');
    expect(record).toMatchObject({ success: false, response: null, model: null, tokens_used: null });
    expect(record).not.toHaveProperty('error');
  });

  it('records cli commands with normalized parameters and result', async () => {
    await audit.logCliCommand({
      command: 'get_all_markets',
      parameters: { limit: 5, since: new Date('2026-01-01T00:00:00Z') },
      result: { markets_count: 5 },
    });
    await audit.logCliCommand({ command: 'create_market' });

    const records = await audit.getHistory('cli_history');
    expect(records.map((record) => record['command'])).toEqual(['get_all_markets', 'create_market']);
    expect(records[0]).toMatchObject({
      parameters: { limit: 5, since: '2026-01-01T00:00:00.000Z' },
      result: { markets_count: 5 },
    });
    expect(records[1]?.['parameters']).toEqual({});
    expect(records[1]).not.toHaveProperty('result');
  });

  it('records rag operations in their own collection', async () => {
    await audit.logRagOperation({ operation_type: 'clear_local_cache', local_directory: 'local_db_events' });

    expect(driver.count('rag_history')).toBe(1);
    const [record] = await audit.getHistory('rag_history');
    expect(record).toMatchObject({
      type: 'rag_operation',
      query: null,
      local_directory: 'local_db_events',
      results_count: null,
    });
  });

  // --- summaries ---

  it('keeps at most ten market summaries', async () => {
    const markets = range(12, (i) => fakeMarket(`m${i}`));
    await audit.logMarketQuery({ query_type: 'get_all_markets', limit: 12, results_count: 12, markets });

    const [record] = await audit.getHistory('market_query_history');
    const summary = record?.['markets_summary'];
    expect(Array.isArray(summary) && summary.length).toBe(10);
    expect(record).toMatchObject({
      sort_by: null,
      results_count: 12,
      markets_summary: expect.arrayContaining([{ id: 'm0', question: 'Will m0 happen?' }]),
    });
  });

  it('omits the market summary when there are no markets', async () => {
    await audit.logMarketQuery({ query_type: 'get_trending_markets', markets: [] });

    const [record] = await audit.getHistory('market_query_history');
    expect(record).not.toHaveProperty('markets_summary');
  });

  it('summarizes news articles by title, source and url', async () => {
    await audit.logNewsQuery({
      keywords: 'rates',
      articles_count: 1,
      articles: [{ title: 'Rates hold', source: null, url: 'https://news.test/a', description: 'long text' }],
    });

    const [record] = await audit.getHistory('news_query_history');
    expect(record?.['articles_summary']).toEqual([
      { title: 'Rates hold', source: null, url: 'https://news.test/a' },
    ]);
  });

  // --- serialization fallback ---

  it('stores the string form of a payload that cannot be normalized', async () => {
    const parameters: Record<string, unknown> = {};
    parameters['self'] = parameters;

    const id = await audit.logCliCommand({ command: 'loop', parameters });

    expect(id).not.toBeNull();
    const [record] = await audit.getHistory('cli_history');
    expect(record?.['parameters']).toBe('[object Object]');
    expect(log.warn).toHaveBeenCalledWith(
      { field: 'parameters', reason: 'Cannot normalize a circular structure' },
      'Could not serialize payload, storing string form',
    );
  });

  it('falls back to the tag form when the payload has no usable toString', async () => {
    const parameters: Record<string, unknown> = Object.create(null);
    parameters['self'] = parameters;

    const id = await audit.logCliCommand({ command: 'loop', parameters });

    expect(id).not.toBeNull();
    const [record] = await audit.getHistory('cli_history');
    expect(record?.['parameters']).toBe('[object Object]');
    expect(log.warn).toHaveBeenCalledWith(
      { field: 'parameters', reason: 'Cannot normalize a circular structure' },
      'Could not serialize payload, storing string form',
    );
  });

  it('stores null for a summary field whose getter throws', async () => {
    const market = {
      id: 'm1',
      get question(): string {
        throw new Error('lazy field failed');
      },
    };

    const id = await audit.logMarketQuery({ query_type: 'get_all_markets', markets: [market] });

    expect(id).not.toBeNull();
    const [record] = await audit.getHistory('market_query_history');
    expect(record?.['markets_summary']).toEqual([{ id: 'm1', question: null }]);
    expect(log.warn).toHaveBeenCalledWith(
      { field: 'question', reason: 'lazy field failed' },
      'Could not read payload field, storing null',
    );
  });

  it('stores null for an article field whose getter throws', async () => {
    const article = {
      title: 'Rates hold',
      source: 'Wire',
      get url(): string {
        throw new Error('lazy field failed');
      },
    };

    await audit.logNewsQuery({ keywords: 'rates', articles: [article] });

    const [record] = await audit.getHistory('news_query_history');
    expect(record?.['articles_summary']).toEqual([{ title: 'Rates hold', source: 'Wire', url: null }]);
  });

  // --- history ---

  it('returns history most recent first and honours filter and limit', async () => {
    const t1 = new Date('2026-01-01T00:00:00Z');
    const t2 = new Date('2026-01-02T00:00:00Z');
    const t3 = new Date('2026-01-03T00:00:00Z');
    await audit.logNewsQuery({ keywords: 'two', timestamp: t2 });
    await audit.logNewsQuery({ keywords: 'three', timestamp: t3, success: false, error: 'quota' });
    await audit.logNewsQuery({ keywords: 'one', timestamp: t1 });

    const all = await audit.getHistory('news_query_history');
    expect(all.map((record) => record['keywords'])).toEqual(['three', 'two', 'one']);

    const failed = await audit.getHistory('news_query_history', 10, { success: false });
    expect(failed.map((record) => record['keywords'])).toEqual(['three']);

    const latest = await audit.getHistory('news_query_history', 1);
    expect(latest.map((record) => record['keywords'])).toEqual(['three']);
  });

  // --- degraded store ---

  it('resolves to null and empty history when the store is down', async () => {
    driver.setAvailable(false);

    expect(await audit.logCliCommand({ command: 'x' })).toBeNull();
    expect(await audit.getHistory('cli_history')).toEqual([]);
    expect(await audit.isStoreConnected()).toBe(false);
  });
});
