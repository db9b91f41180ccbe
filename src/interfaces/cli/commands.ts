import type { AppContext } from '../../context.js';
import type { FeedEvent, FeedMarket, PipelineOutcome, TradeDecision } from '../../domain/index.js';
import { isAuditCollection, AUDIT_COLLECTION_NAMES } from '../../domain/index.js';
import { errorMessage } from '../../application/index.js';
import { formatJson, type Output } from './output.js';

/**
 * Command handlers behind the CLI.
 *
 * Each handler records one `cli_command` audit record, plus the
 * category record for the collaborator it queried. Handlers that query a
 * collaborator directly record the failure and rethrow it; pipeline
 * commands never throw, since the pipelines absorb their own failures.
 */

interface Audited<T> {
  value: T;
  /** Summary stored as the command's `result`. */
  result: Record<string, unknown>;
}

async function audited<T>(
  ctx: AppContext,
  command: string,
  parameters: Record<string, unknown>,
  body: () => Promise<Audited<T>>,
  onFailure: (error: string) => Promise<unknown> = async () => undefined,
): Promise<T> {
  try {
    const { value, result } = await body();
    await ctx.audit.logCliCommand({ command, parameters, result });
    return value;
  } catch (err: unknown) {
    const error = errorMessage(err);
    await onFailure(error);
    await ctx.audit.logCliCommand({ command, parameters, success: false, error });
    throw err;
  }
}

function describeTradeOutcome(outcome: PipelineOutcome<TradeDecision>): string {
  switch (outcome.status) {
    case 'success':
      return `Trade on market ${outcome.decision.market_id}: ${outcome.decision.best_trade} (amount ${outcome.decision.amount})`;
    case 'empty':
      return 'No markets left after filtering; nothing to trade';
    case 'failed':
      return `Gave up after ${outcome.attempts} attempts: ${outcome.error}`;
  }
}

export async function runAutonomousTrader(ctx: AppContext, out: Output): Promise<void> {
  out.print('Starting autonomous trader...');
  out.print('Orders are not sent: the execution sink runs in dry-run mode');

  const outcome = await ctx.tradePipeline().runOneBestTrade();
  out.print(describeTradeOutcome(outcome));

  await ctx.audit.logCliCommand({
    command: 'run_autonomous_trader',
    parameters: {},
    result: { status: outcome.status, attempts: outcome.attempts },
    success: outcome.status !== 'failed',
    error: outcome.status === 'failed' ? outcome.error : null,
  });
}

export async function createMarket(ctx: AppContext, out: Output): Promise<string | undefined> {
  out.print('Generating market idea...');

  const description = await ctx.marketCreationPipeline().runOneBestMarketCreation();
  out.print(description !== undefined ? `Market description:\n${description}` : 'No market idea produced');

  await ctx.audit.logCliCommand({
    command: 'create_market',
    parameters: {},
    result: { market_description: description ?? null },
    success: description !== undefined,
  });
  return description;
}

export async function getAllMarkets(
  ctx: AppContext,
  out: Output,
  options: { limit: number; sortBy: string },
): Promise<FeedMarket[]> {
  const parameters = { limit: options.limit, sort_by: options.sortBy };
  out.print(`Fetching ${options.limit} markets, sorted by ${options.sortBy}`);

  return audited(ctx, 'get_all_markets', parameters, async () => {
    let markets = await ctx.feed.getAllMarkets();
    if (options.sortBy === 'spread') {
      markets = [...markets].sort((a, b) => (b.spread ?? 0) - (a.spread ?? 0));
    }
    markets = markets.slice(0, options.limit);
    out.print(formatJson(markets));

    await ctx.audit.logMarketQuery({
      query_type: 'get_all_markets',
      limit: options.limit,
      sort_by: options.sortBy,
      results_count: markets.length,
      markets,
    });
    return { value: markets, result: { markets_count: markets.length } };
  }, (error) => ctx.audit.logMarketQuery({
    query_type: 'get_all_markets',
    limit: options.limit,
    sort_by: options.sortBy,
    success: false,
    error,
  }));
}

export async function getTrendingMarkets(
  ctx: AppContext,
  out: Output,
  options: { limit: number },
): Promise<FeedMarket[]> {
  out.print(`Fetching ${options.limit} trending markets (sorted by 24h volume)`);

  return audited(ctx, 'get_trending_markets', { limit: options.limit }, async () => {
    const markets = await ctx.feed.getTrendingMarkets(options.limit);
    out.print(formatJson(markets));

    await ctx.audit.logMarketQuery({
      query_type: 'get_trending_markets',
      limit: options.limit,
      results_count: markets.length,
      markets,
    });
    return { value: markets, result: { markets_count: markets.length } };
  }, (error) => ctx.audit.logMarketQuery({
    query_type: 'get_trending_markets',
    limit: options.limit,
    success: false,
    error,
  }));
}

export async function getAllEvents(
  ctx: AppContext,
  out: Output,
  options: { limit: number; sortBy: string },
): Promise<FeedEvent[]> {
  const parameters = { limit: options.limit, sort_by: options.sortBy };
  out.print(`Fetching ${options.limit} events, sorted by ${options.sortBy}`);

  return audited(ctx, 'get_all_events', parameters, async () => {
    let events = await ctx.feed.getAllTradeableEvents();
    if (options.sortBy === 'number_of_markets') {
      events = [...events].sort((a, b) => b.markets.length - a.markets.length);
    }
    events = events.slice(0, options.limit);
    out.print(formatJson(events));

    await ctx.audit.logMarketQuery({
      query_type: 'get_all_events',
      limit: options.limit,
      sort_by: options.sortBy,
      results_count: events.length,
    });
    return { value: events, result: { events_count: events.length } };
  }, (error) => ctx.audit.logMarketQuery({
    query_type: 'get_all_events',
    limit: options.limit,
    sort_by: options.sortBy,
    success: false,
    error,
  }));
}

export async function getRelevantNews(
  ctx: AppContext,
  out: Output,
  keywords: string,
): Promise<void> {
  out.print(`Fetching news for keywords: ${keywords}`);

  await audited(ctx, 'get_relevant_news', { keywords }, async () => {
    const articles = await ctx.news.getArticles(keywords);
    out.print(formatJson(articles));

    await ctx.audit.logNewsQuery({
      keywords,
      articles_count: articles.length,
      articles,
    });
    return { value: undefined, result: { articles_count: articles.length } };
  }, (error) => ctx.audit.logNewsQuery({ keywords, success: false, error }));
}

export async function showHistory(
  ctx: AppContext,
  out: Output,
  options: { collection: string; limit: number; failedOnly: boolean },
): Promise<void> {
  if (!isAuditCollection(options.collection)) {
    throw new Error(
      `Unknown collection "${options.collection}". Expected one of: ${AUDIT_COLLECTION_NAMES.join(', ')}`,
    );
  }

  const filter = options.failedOnly ? { success: false } : {};
  const records = await ctx.audit.getHistory(options.collection, options.limit, filter);
  if (records.length === 0) {
    out.print(`No records in ${options.collection}`);
    return;
  }
  for (const record of records) {
    out.print(JSON.stringify(record));
  }
}
