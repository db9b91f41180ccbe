import type { Logger } from 'pino';
import type { FeedEvent, FeedMarket, MarketDataFeed } from '../../domain/index.js';
import { requestJson } from '../http.js';
import {
  gammaEventListSchema,
  gammaMarketListSchema,
  type GammaEvent,
  type GammaMarket,
} from './schemas.js';

export interface HttpMarketFeedOptions {
  baseUrl: string;
  log: Logger;
  /** Page size requested from the upstream list endpoints. */
  pageSize?: number;
  timeoutMs?: number;
}

const SERVICE = 'market-feed';

/**
 * Market-data feed over the upstream REST API.
 *
 * One request per call, no retries: failures propagate to the pipeline,
 * which owns the retry policy.
 */
export class HttpMarketFeed implements MarketDataFeed {
  private readonly pageSize: number;

  constructor(private readonly options: HttpMarketFeedOptions) {
    this.pageSize = options.pageSize ?? 500;
  }

  async getAllTradeableEvents(): Promise<FeedEvent[]> {
    const events = await this.fetchEvents({ active: 'true', closed: 'false', archived: 'false' });
    return events.filter(isTradeable).map(toFeedEvent);
  }

  async getAllEvents(): Promise<FeedEvent[]> {
    const events = await this.fetchEvents({});
    return events.map(toFeedEvent);
  }

  async getAllMarkets(): Promise<FeedMarket[]> {
    const markets = await this.fetchMarkets({ active: 'true', closed: 'false' });
    return markets.map(toFeedMarket);
  }

  async getTrendingMarkets(limit: number): Promise<FeedMarket[]> {
    const markets = await this.fetchMarkets({
      active: 'true',
      closed: 'false',
      order: 'volume24hr',
      ascending: 'false',
      limit: String(limit),
    });
    return markets.slice(0, limit).map(toFeedMarket);
  }

  private async fetchEvents(params: Record<string, string>): Promise<GammaEvent[]> {
    const body = await requestJson(SERVICE, this.url('/events', params), { timeoutMs: this.options.timeoutMs });
    const events = gammaEventListSchema.parse(body);
    this.options.log.debug({ count: events.length }, 'Fetched events from feed');
    return events;
  }

  private async fetchMarkets(params: Record<string, string>): Promise<GammaMarket[]> {
    const body = await requestJson(SERVICE, this.url('/markets', params), { timeoutMs: this.options.timeoutMs });
    const markets = gammaMarketListSchema.parse(body);
    this.options.log.debug({ count: markets.length }, 'Fetched markets from feed');
    return markets;
  }

  private url(path: string, params: Record<string, string>): URL {
    const url = new URL(path, this.options.baseUrl);
    url.searchParams.set('limit', String(this.pageSize));
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url;
  }
}

function isTradeable(event: GammaEvent): boolean {
  return event.active !== false
    && event.closed !== true
    && event.archived !== true
    && event.restricted !== true;
}

export function toFeedEvent(event: GammaEvent): FeedEvent {
  return {
    id: event.id,
    title: event.title,
    description: event.description ?? undefined,
    markets: (event.markets ?? []).map((market) => market.id),
  };
}

export function toFeedMarket(market: GammaMarket): FeedMarket {
  return {
    id: market.id,
    question: market.question,
    description: market.description ?? undefined,
    outcomes: market.outcomes ?? [],
    outcome_prices: market.outcomePrices ?? [],
    spread: market.spread ?? undefined,
    volume_24hr: market.volume24hr ?? undefined,
  };
}
