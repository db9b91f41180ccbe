import type { Logger } from 'pino';
import type { ExecutionSink, FeedMarket } from '../../domain/index.js';

/** Logs the order it would place and places nothing. */
export class DryRunExecutionSink implements ExecutionSink {
  constructor(private readonly log: Logger) {}

  async executeMarketOrder(market: FeedMarket, amount: number): Promise<void> {
    this.log.info(
      { market_id: market.id, question: market.question, amount },
      'Dry run: market order not sent',
    );
  }
}
