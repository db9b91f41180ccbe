import type { PipelineCounts } from '../domain/index.js';
import { DecisionPipeline, type Shortlist } from './decision-pipeline.js';

/**
 * Evaluates all tradeable events and asks the reasoning service for the
 * description of one new market worth creating.
 */
export class MarketCreationPipeline extends DecisionPipeline<string> {
  protected readonly operation = 'one_best_market';

  /** Resolves to the market description, or undefined when none was produced. */
  async runOneBestMarketCreation(): Promise<string | undefined> {
    const outcome = await this.run();
    return outcome.status === 'success' ? outcome.decision : undefined;
  }

  protected async decide(
    shortlist: Shortlist,
    counts: PipelineCounts,
    attempt: number,
  ): Promise<string> {
    const description = await this.reasoning.selectBestMarketIdea(shortlist.all);
    this.log.info({ stage: 'decide', attempt }, `Idea for new market: ${description}`);

    await this.audit.logMarketCreation({
      market_description: description,
      ...counts,
      attempt,
    });

    return description;
  }

  protected async recordUnsuccessful(
    counts: PipelineCounts,
    error: string,
    attempt: number,
    retriesExhausted: boolean,
  ): Promise<void> {
    await this.audit.logMarketCreation({
      ...counts,
      attempt,
      retries_exhausted: retriesExhausted,
      success: false,
      error,
    });
  }
}
