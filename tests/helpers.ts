import { vi } from 'vitest';
import type { Logger } from 'pino';
import { AuditLog } from '../src/application/index.js';
import { loadConfig } from '../src/config.js';
import { createAppContext } from '../src/context.js';
import type {
  ExecutionSink,
  FeedEvent,
  FeedMarket,
  MarketDataFeed,
  NewsFeed,
  ReasoningService,
} from '../src/domain/index.js';
import { MemoryDocumentDriver, RecordStore } from '../src/infrastructure/store/index.js';
import type { Output } from '../src/interfaces/cli/output.js';

/** Minimal fake logger; `child()` hands back the same instance. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Connected in-memory record store plus an audit log on top of it. */
export async function memoryAudit(options: { now?: () => Date } = {}) {
  const driver = new MemoryDocumentDriver();
  const log = fakeLogger();
  const store = new RecordStore(driver, { log, timeoutMs: 100 });
  await store.connect();
  const audit = new AuditLog(store, { log, ...options });
  return { driver, store, audit, log };
}

export function fakeEvent(id: string, markets: string[] = []): FeedEvent {
  return { id, title: `Event ${id}`, markets };
}

export function fakeMarket(id: string, overrides: Partial<FeedMarket> = {}): FeedMarket {
  return {
    id,
    question: `Will ${id} happen?`,
    outcomes: ['Yes', 'No'],
    outcome_prices: [0.5, 0.5],
    ...overrides,
  };
}

export function range<T>(count: number, make: (index: number) => T): T[] {
  return Array.from({ length: count }, (_, index) => make(index));
}

export function fakeFeed() {
  return {
    getAllTradeableEvents: vi.fn<MarketDataFeed['getAllTradeableEvents']>(),
    getAllEvents: vi.fn<MarketDataFeed['getAllEvents']>(),
    getAllMarkets: vi.fn<MarketDataFeed['getAllMarkets']>(),
    getTrendingMarkets: vi.fn<MarketDataFeed['getTrendingMarkets']>(),
  } satisfies MarketDataFeed;
}

export function fakeReasoning() {
  return {
    filterEventsByRelevance: vi.fn<ReasoningService['filterEventsByRelevance']>(),
    mapEventsToMarkets: vi.fn<ReasoningService['mapEventsToMarkets']>(),
    filterMarketsByQuality: vi.fn<ReasoningService['filterMarketsByQuality']>(),
    selectBestTrade: vi.fn<ReasoningService['selectBestTrade']>(),
    formatTradeForExecution: vi.fn<ReasoningService['formatTradeForExecution']>(),
    selectBestMarketIdea: vi.fn<ReasoningService['selectBestMarketIdea']>(),
  } satisfies ReasoningService;
}

/** Output sink that keeps printed lines for assertions. */
export function captureOutput() {
  const lines: string[] = [];
  const errors: string[] = [];
  const out: Output = {
    print: (line) => {
      lines.push(line);
    },
    error: (line) => {
      errors.push(line);
    },
  };
  return { out, lines, errors };
}

/**
 * Application context on an in-memory store with every collaborator
 * faked. Extra environment keys override the defaults.
 */
export async function testContext(env: Record<string, string> = {}) {
  const driver = new MemoryDocumentDriver();
  const feed = fakeFeed();
  const reasoning = fakeReasoning();
  const news = { getArticles: vi.fn<NewsFeed['getArticles']>() } satisfies NewsFeed;
  const execution = {
    executeMarketOrder: vi.fn<ExecutionSink['executeMarketOrder']>().mockResolvedValue(undefined),
  } satisfies ExecutionSink;
  const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);

  const config = loadConfig({ STORE_DRIVER: 'memory', LOCAL_CACHE_DIRS: '', ...env });
  const ctx = await createAppContext(config, fakeLogger(), { driver, feed, reasoning, news, execution, sleep });
  return { ctx, driver, feed, reasoning, news, execution, sleep };
}
