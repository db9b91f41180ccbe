import type { ExecutionSink, PipelineCounts, PipelineOutcome, TradeDecision } from '../domain/index.js';
import { clearLocalCaches } from './local-cache.js';
import { DecisionPipeline, type PipelineDeps, type Shortlist } from './decision-pipeline.js';

export interface TradePipelineDeps extends PipelineDeps {
  execution: ExecutionSink;
  /** Local retrieval caches wiped before every attempt. */
  cacheDirs?: readonly string[];
}

const OPERATION = 'one_best_trade';

/**
 * Evaluates all tradeable events, narrows them to one market, sizes a
 * trade on it, and hands the order to the execution sink.
 */
export class TradePipeline extends DecisionPipeline<TradeDecision> {
  protected readonly operation = OPERATION;
  private readonly execution: ExecutionSink;
  private readonly cacheDirs: readonly string[];

  constructor(deps: TradePipelineDeps) {
    super(deps);
    this.execution = deps.execution;
    this.cacheDirs = deps.cacheDirs ?? [];
  }

  runOneBestTrade(): Promise<PipelineOutcome<TradeDecision>> {
    return this.run();
  }

  protected override async beforeAttempt(): Promise<void> {
    await clearLocalCaches(this.cacheDirs, { log: this.log, audit: this.audit });
  }

  protected async decide(
    shortlist: Shortlist,
    counts: PipelineCounts,
    attempt: number,
  ): Promise<TradeDecision> {
    const market = shortlist.first;

    const bestTrade = await this.reasoning.selectBestTrade(market);
    this.log.info({ stage: 'decide', market_id: market.id, best_trade: bestTrade, attempt }, 'Calculated trade');

    const amount = await this.reasoning.formatTradeForExecution(bestTrade);
    await this.execution.executeMarketOrder(market, amount);

    await this.audit.logTradeOperation({
      operation_type: OPERATION,
      market_id: market.id,
      market_data: market,
      ...counts,
      best_trade: bestTrade,
      amount,
      attempt,
    });

    return { market_id: market.id, best_trade: bestTrade, amount };
  }

  protected async recordUnsuccessful(
    counts: PipelineCounts,
    error: string,
    attempt: number,
    retriesExhausted: boolean,
  ): Promise<void> {
    await this.audit.logTradeOperation({
      operation_type: OPERATION,
      ...counts,
      attempt,
      retries_exhausted: retriesExhausted,
      success: false,
      error,
    });
  }
}
