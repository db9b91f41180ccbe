import type { Logger } from 'pino';
import { AUDIT_COLLECTIONS } from '../domain/index.js';
import type { AuditCollection, AuditRecordType, JsonValue } from '../domain/index.js';
import type { Document, RecordStore, StoredDocument } from '../infrastructure/store/index.js';
import { errorMessage } from './errors.js';
import { normalizeValue } from './serialize.js';

/** Outcome fields shared by every logging operation. */
export interface AuditOutcome {
  /** Defaults to true. */
  success?: boolean;
  /** Stored only when non-empty. */
  error?: string | null | undefined;
  /** Write time is used when omitted. */
  timestamp?: Date;
}

export interface CliCommandEntry extends AuditOutcome {
  command: string;
  parameters?: Record<string, unknown>;
  result?: unknown;
}

export interface StageCountFields {
  events_count?: number | null;
  markets_count?: number | null;
  filtered_events_count?: number | null;
  filtered_markets_count?: number | null;
}

export interface RetryFields {
  /** 1-based attempt number within a pipeline call. */
  attempt?: number;
  /** Set on the failure record that ends a pipeline call. */
  retries_exhausted?: boolean;
}

export interface TradeOperationEntry extends AuditOutcome, StageCountFields, RetryFields {
  /** e.g. `one_best_trade` */
  operation_type: string;
  market_id?: string | null;
  market_data?: unknown;
  trade_data?: unknown;
  best_trade?: string | null;
  amount?: number | null;
}

export interface MarketCreationEntry extends AuditOutcome, StageCountFields, RetryFields {
  market_description?: string | null;
}

export interface LlmQueryEntry extends AuditOutcome {
  query_type: string;
  user_input: string;
  response?: string | null;
  model?: string | null;
  tokens_used?: number | null;
}

export interface MarketQueryEntry extends AuditOutcome {
  /** e.g. `get_all_markets`, `get_trending_markets`, `get_all_events` */
  query_type: string;
  limit?: number | null;
  sort_by?: string | null;
  results_count?: number | null;
  markets?: readonly unknown[];
}

export interface RagOperationEntry extends AuditOutcome {
  operation_type: string;
  query?: string | null;
  local_directory?: string | null;
  results_count?: number | null;
}

export interface NewsQueryEntry extends AuditOutcome {
  keywords: string;
  articles_count?: number | null;
  articles?: readonly unknown[];
}

export interface AuditLogOptions {
  log: Logger;
  now?: () => Date;
}

/** Summaries keep at most this many items per record. */
const SUMMARY_LIMIT = 10;

/** Default page size for history reads. */
export const DEFAULT_HISTORY_LIMIT = 100;

/**
 * Typed façade over the record store: one operation per audit category.
 *
 * Each operation builds a flat record tagged with its `type`, normalizes
 * embedded payloads, and appends it to the category's collection.
 * Records are never updated afterwards. Operations resolve to the new
 * record id, or `null` when the store is degraded; they never reject.
 */
export class AuditLog {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: RecordStore,
    options: AuditLogOptions,
  ) {
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
  }

  logCliCommand(entry: CliCommandEntry): Promise<string | null> {
    const fields: Document = {
      command: entry.command,
      parameters: this.normalize(entry.parameters ?? {}, 'parameters'),
    };
    if (entry.result !== undefined && entry.result !== null) {
      fields['result'] = this.normalize(entry.result, 'result');
    }
    return this.write('cli_command', fields, entry);
  }

  logTradeOperation(entry: TradeOperationEntry): Promise<string | null> {
    const fields: Document = {
      operation_type: entry.operation_type,
      market_id: entry.market_id ?? null,
      ...countFields(entry),
      best_trade: entry.best_trade ?? null,
      amount: entry.amount ?? null,
      ...retryFields(entry),
    };
    if (entry.market_data) {
      fields['market_data'] = this.normalize(entry.market_data, 'market_data');
    }
    if (entry.trade_data) {
      fields['trade_data'] = this.normalize(entry.trade_data, 'trade_data');
    }
    return this.write('trade_operation', fields, entry);
  }

  logMarketCreation(entry: MarketCreationEntry): Promise<string | null> {
    return this.write('market_creation', {
      market_description: entry.market_description ?? null,
      ...countFields(entry),
      ...retryFields(entry),
    }, entry);
  }

  logLlmQuery(entry: LlmQueryEntry): Promise<string | null> {
    return this.write('llm_query', {
      query_type: entry.query_type,
      user_input: entry.user_input,
      response: entry.response ?? null,
      model: entry.model ?? null,
      tokens_used: entry.tokens_used ?? null,
    }, entry);
  }

  logMarketQuery(entry: MarketQueryEntry): Promise<string | null> {
    const fields: Document = {
      query_type: entry.query_type,
      limit: entry.limit ?? null,
      sort_by: entry.sort_by ?? null,
      results_count: entry.results_count ?? null,
    };
    if (entry.markets && entry.markets.length > 0) {
      fields['markets_summary'] = entry.markets.slice(0, SUMMARY_LIMIT).map((market) => ({
        id: this.pick(market, 'id'),
        question: this.pick(market, 'question'),
      }));
    }
    return this.write('market_query', fields, entry);
  }

  logRagOperation(entry: RagOperationEntry): Promise<string | null> {
    return this.write('rag_operation', {
      operation_type: entry.operation_type,
      query: entry.query ?? null,
      local_directory: entry.local_directory ?? null,
      results_count: entry.results_count ?? null,
    }, entry);
  }

  logNewsQuery(entry: NewsQueryEntry): Promise<string | null> {
    const fields: Document = {
      keywords: entry.keywords,
      articles_count: entry.articles_count ?? null,
    };
    if (entry.articles && entry.articles.length > 0) {
      fields['articles_summary'] = entry.articles.slice(0, SUMMARY_LIMIT).map((article) => ({
        title: this.pick(article, 'title'),
        source: this.pick(article, 'source'),
        url: this.pick(article, 'url'),
      }));
    }
    return this.write('news_query', fields, entry);
  }

  /** Reads back a collection, most recent first. */
  getHistory(
    collection: AuditCollection,
    limit: number = DEFAULT_HISTORY_LIMIT,
    filter: Document = {},
  ): Promise<StoredDocument[]> {
    return this.store.find(collection, filter, {
      limit,
      sort: [['timestamp', -1]],
    });
  }

  isStoreConnected(): Promise<boolean> {
    return this.store.isConnected();
  }

  close(): Promise<void> {
    return this.store.close();
  }

  private write(type: AuditRecordType, fields: Document, outcome: AuditOutcome): Promise<string | null> {
    const document: Document = {
      type,
      ...fields,
      success: outcome.success ?? true,
      timestamp: outcome.timestamp ?? this.now(),
    };
    if (outcome.error) {
      document['error'] = outcome.error;
    }
    return this.store.insertOne(AUDIT_COLLECTIONS[type], document);
  }

  /** Normalizes a payload, degrading to its string form on failure. */
  private normalize(value: unknown, field: string): JsonValue {
    try {
      return normalizeValue(value);
    } catch (err: unknown) {
      this.log.warn({ field, reason: errorMessage(err) }, 'Could not serialize payload, storing string form');
      return safeString(value);
    }
  }

  private pick(item: unknown, key: string): JsonValue {
    if (typeof item !== 'object' || item === null) return null;

    let value: unknown;
    try {
      value = Reflect.get(item, key);
    } catch (err: unknown) {
      this.log.warn({ field: key, reason: errorMessage(err) }, 'Could not read payload field, storing null');
      return null;
    }
    return value === undefined ? null : this.normalize(value, key);
  }
}

/** `String(value)`, or the tag form for objects without a usable `toString`. */
function safeString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

function countFields(entry: StageCountFields): Document {
  return {
    events_count: entry.events_count ?? null,
    markets_count: entry.markets_count ?? null,
    filtered_events_count: entry.filtered_events_count ?? null,
    filtered_markets_count: entry.filtered_markets_count ?? null,
  };
}

function retryFields(entry: RetryFields): Document {
  const fields: Document = {};
  if (entry.attempt !== undefined) fields['attempt'] = entry.attempt;
  if (entry.retries_exhausted) fields['retries_exhausted'] = true;
  return fields;
}
