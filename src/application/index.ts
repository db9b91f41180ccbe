export { AuditLog, DEFAULT_HISTORY_LIMIT } from './audit-log.js';
export type {
  AuditLogOptions,
  AuditOutcome,
  CliCommandEntry,
  TradeOperationEntry,
  MarketCreationEntry,
  LlmQueryEntry,
  MarketQueryEntry,
  RagOperationEntry,
  NewsQueryEntry,
} from './audit-log.js';
export { normalizeValue } from './serialize.js';
export { SerializationError, errorMessage } from './errors.js';
export { DEFAULT_RETRY_POLICY, backoffDelay, isFinalAttempt } from './retry-policy.js';
export type { RetryPolicy } from './retry-policy.js';
export { DecisionPipeline, toCollection } from './decision-pipeline.js';
export type { PipelineDeps, Shortlist } from './decision-pipeline.js';
export { TradePipeline } from './trade-pipeline.js';
export type { TradePipelineDeps } from './trade-pipeline.js';
export { MarketCreationPipeline } from './market-creation-pipeline.js';
export { clearLocalCaches } from './local-cache.js';
export { listHistory } from './query-history.js';
export type { ListHistoryParams } from './query-history.js';
