import type { FeedEvent, FeedMarket, NewsArticle } from './market.js';

/**
 * Interfaces the decision pipeline consumes. Implementations live in
 * `infrastructure/`; tests substitute stubs.
 */

/**
 * What a reasoning filter may hand back. A well-behaved service returns
 * the surviving candidates; a misbehaving one can return free text or
 * nothing, which callers treat as an empty collection.
 */
export type FilterResult<T> = T[] | string | null;

export interface MarketDataFeed {
  getAllTradeableEvents(): Promise<FeedEvent[]>;
  getAllEvents(): Promise<FeedEvent[]>;
  getAllMarkets(): Promise<FeedMarket[]>;
  getTrendingMarkets(limit: number): Promise<FeedMarket[]>;
}

export interface ReasoningService {
  filterEventsByRelevance(events: readonly FeedEvent[]): Promise<FilterResult<FeedEvent>>;
  mapEventsToMarkets(events: readonly FeedEvent[]): Promise<FeedMarket[]>;
  filterMarketsByQuality(markets: readonly FeedMarket[]): Promise<FilterResult<FeedMarket>>;
  selectBestTrade(market: FeedMarket): Promise<string>;
  /** Turns a trade recommendation into a position size in USDC. */
  formatTradeForExecution(bestTrade: string): Promise<number>;
  selectBestMarketIdea(markets: readonly FeedMarket[]): Promise<string>;
}

export interface ExecutionSink {
  executeMarketOrder(market: FeedMarket, amount: number): Promise<void>;
}

export interface NewsFeed {
  getArticles(keywords: string): Promise<NewsArticle[]>;
}
