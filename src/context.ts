import type { Logger } from 'pino';
import type { AppConfig } from './config.js';
import type {
  ExecutionSink,
  MarketDataFeed,
  NewsFeed,
  ReasoningService,
} from './domain/index.js';
import {
  AuditLog,
  MarketCreationPipeline,
  TradePipeline,
} from './application/index.js';
import {
  DryRunExecutionSink,
  HttpMarketFeed,
  HttpNewsFeed,
  HttpReasoningService,
  MemoryDocumentDriver,
  PostgresDocumentDriver,
  createDbClient,
  openRecordStore,
  type DocumentDriver,
  type RecordStore,
} from './infrastructure/index.js';

/**
 * Everything a command or the server needs, built once by the caller
 * and closed by the caller. Nothing here is a module-level singleton.
 */
export interface AppContext {
  config: AppConfig;
  log: Logger;
  store: RecordStore;
  audit: AuditLog;
  feed: MarketDataFeed;
  reasoning: ReasoningService;
  execution: ExecutionSink;
  news: NewsFeed;
  tradePipeline(): TradePipeline;
  marketCreationPipeline(): MarketCreationPipeline;
  close(): Promise<void>;
}

/** Collaborator overrides, used by tests and embedding hosts. */
export interface ContextOverrides {
  driver?: DocumentDriver;
  feed?: MarketDataFeed;
  reasoning?: ReasoningService;
  execution?: ExecutionSink;
  news?: NewsFeed;
  sleep?: (ms: number) => Promise<void>;
}

function createDriver(config: AppConfig): DocumentDriver {
  if (config.store.driver === 'memory') {
    return new MemoryDocumentDriver();
  }
  const client = createDbClient(config.store.databaseUrl, {
    connectTimeout: Math.max(1, Math.ceil(config.store.timeoutMs / 1000)),
  });
  return new PostgresDocumentDriver(client);
}

/**
 * Builds the application context. The record store connects eagerly;
 * an unreachable store leaves the context usable with auditing disabled.
 */
export async function createAppContext(
  config: AppConfig,
  log: Logger,
  overrides: ContextOverrides = {},
): Promise<AppContext> {
  const store = await openRecordStore(overrides.driver ?? createDriver(config), {
    log: log.child({ component: 'record-store' }),
    timeoutMs: config.store.timeoutMs,
  });
  const audit = new AuditLog(store, { log: log.child({ component: 'audit-log' }) });

  const feed = overrides.feed ?? new HttpMarketFeed({
    baseUrl: config.feed.baseUrl,
    log,
    timeoutMs: config.requestTimeoutMs,
  });
  const reasoning = overrides.reasoning ?? new HttpReasoningService({
    baseUrl: config.reasoning.baseUrl,
    audit,
    log,
    timeoutMs: config.requestTimeoutMs,
  });
  const execution = overrides.execution ?? new DryRunExecutionSink(log);
  const news = overrides.news ?? new HttpNewsFeed({
    baseUrl: config.news.baseUrl,
    apiKey: config.news.apiKey,
    log,
    timeoutMs: config.requestTimeoutMs,
  });

  const pipelineDeps = {
    feed,
    reasoning,
    audit,
    retry: config.retry,
    ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
  };

  return {
    config,
    log,
    store,
    audit,
    feed,
    reasoning,
    execution,
    news,
    tradePipeline: () => new TradePipeline({
      ...pipelineDeps,
      log: log.child({ pipeline: 'trade' }),
      execution,
      cacheDirs: config.localCacheDirs,
    }),
    marketCreationPipeline: () => new MarketCreationPipeline({
      ...pipelineDeps,
      log: log.child({ pipeline: 'market-creation' }),
    }),
    close: () => audit.close(),
  };
}
