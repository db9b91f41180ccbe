import type { Logger } from 'pino';
import { z } from 'zod';
import type {
  FeedEvent,
  FeedMarket,
  FilterResult,
  ReasoningService,
} from '../../domain/index.js';
import type { AuditLog } from '../../application/audit-log.js';
import { errorMessage } from '../../application/errors.js';
import { requestJson } from '../http.js';
import {
  eventFilterResultSchema,
  feedMarketSchema,
  marketFilterResultSchema,
  reasoningEnvelopeSchema,
} from './schemas.js';

export interface HttpReasoningServiceOptions {
  baseUrl: string;
  audit: AuditLog;
  log: Logger;
  timeoutMs?: number;
}

const SERVICE = 'reasoning';
const RESPONSE_SUMMARY_LENGTH = 500;

/**
 * Reasoning/ranking service reached over HTTP.
 *
 * Every operation is a `POST /v1/<operation>` with the candidates as
 * JSON; the answer is validated and each call, successful or not, is
 * recorded as an `llm_query` audit record.
 */
export class HttpReasoningService implements ReasoningService {
  constructor(private readonly options: HttpReasoningServiceOptions) {}

  filterEventsByRelevance(events: readonly FeedEvent[]): Promise<FilterResult<FeedEvent>> {
    return this.call('filter_events', { events }, `${events.length} events`, eventFilterResultSchema);
  }

  mapEventsToMarkets(events: readonly FeedEvent[]): Promise<FeedMarket[]> {
    return this.call('map_events_to_markets', { events }, `${events.length} events`, feedMarketSchema.array());
  }

  filterMarketsByQuality(markets: readonly FeedMarket[]): Promise<FilterResult<FeedMarket>> {
    return this.call('filter_markets', { markets }, `${markets.length} markets`, marketFilterResultSchema);
  }

  selectBestTrade(market: FeedMarket): Promise<string> {
    return this.call('select_best_trade', { market }, `market ${market.id}: ${market.question}`, textSchema);
  }

  formatTradeForExecution(bestTrade: string): Promise<number> {
    return this.call('format_trade_for_execution', { best_trade: bestTrade }, bestTrade, amountSchema);
  }

  selectBestMarketIdea(markets: readonly FeedMarket[]): Promise<string> {
    return this.call('select_best_market_idea', { markets }, `${markets.length} markets`, textSchema);
  }

  private async call<T>(
    operation: string,
    body: Record<string, unknown>,
    summary: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = new URL(`/v1/${operation}`, this.options.baseUrl);

    try {
      const raw = await requestJson(SERVICE, url, {
        method: 'POST',
        body,
        timeoutMs: this.options.timeoutMs,
      });
      const envelope = reasoningEnvelopeSchema.parse(raw);
      const result = schema.parse(envelope.result);

      this.options.log.debug({ operation, model: envelope.model }, 'Reasoning call completed');
      await this.options.audit.logLlmQuery({
        query_type: operation,
        user_input: summary,
        response: summarize(result),
        model: envelope.model ?? null,
        tokens_used: envelope.tokens_used ?? null,
      });

      return result;
    } catch (err: unknown) {
      await this.options.audit.logLlmQuery({
        query_type: operation,
        user_input: summary,
        success: false,
        error: errorMessage(err),
      });
      throw err;
    }
  }
}

const textSchema = z.string().min(1);
const amountSchema = z.number().nonnegative();

function summarize(result: unknown): string {
  if (typeof result === 'string') return result.slice(0, RESPONSE_SUMMARY_LENGTH);
  if (Array.isArray(result)) return `${result.length} items`;
  if (result === null) return 'null';
  return String(result);
}
