export type { FeedEvent, FeedMarket, NewsArticle } from './market.js';
export { AUDIT_COLLECTIONS, AUDIT_COLLECTION_NAMES, isAuditCollection } from './audit.js';
export type { AuditRecordType, AuditCollection, JsonValue } from './audit.js';
export { emptyCounts, NO_CANDIDATES_ERROR } from './pipeline.js';
export type { PipelineStage, PipelineCounts, PipelineOutcome, TradeDecision } from './pipeline.js';
export type {
  FilterResult,
  MarketDataFeed,
  ReasoningService,
  ExecutionSink,
  NewsFeed,
} from './collaborators.js';
