export { createDbClient, records } from './db/index.js';
export type { Database, DbClient, RecordRow } from './db/index.js';
export {
  RecordStore,
  openRecordStore,
  MemoryDocumentDriver,
  PostgresDocumentDriver,
} from './store/index.js';
export type {
  Document,
  StoredDocument,
  SortSpec,
  FindOptions,
  UpdateSpec,
  DocumentDriver,
  RecordStoreOptions,
} from './store/index.js';
export { HttpMarketFeed } from './feed/http-market-feed.js';
export { HttpReasoningService } from './reasoning/http-reasoning-service.js';
export { HttpNewsFeed } from './news/http-news-feed.js';
export { DryRunExecutionSink } from './execution/dry-run-execution-sink.js';
export { UpstreamRequestError, requestJson } from './http.js';
export type { AuditPluginOptions } from './store/audit-plugin.js';
export { auditPlugin } from './store/index.js';
