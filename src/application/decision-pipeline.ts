import type { Logger } from 'pino';
import { emptyCounts, NO_CANDIDATES_ERROR } from '../domain/index.js';
import type {
  FeedMarket,
  FilterResult,
  MarketDataFeed,
  PipelineCounts,
  PipelineOutcome,
  PipelineStage,
  ReasoningService,
} from '../domain/index.js';
import type { AuditLog } from './audit-log.js';
import { errorMessage } from './errors.js';
import {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  isFinalAttempt,
  sleep,
  type RetryPolicy,
} from './retry-policy.js';

export interface PipelineDeps {
  feed: MarketDataFeed;
  reasoning: ReasoningService;
  audit: AuditLog;
  log: Logger;
  retry?: RetryPolicy;
  /** Injected so tests can skip real backoff waits. */
  sleep?: (ms: number) => Promise<void>;
}

/** Markets surviving both filters, with the first one split out. */
export interface Shortlist {
  readonly first: FeedMarket;
  readonly all: readonly FeedMarket[];
}

/**
 * Treats anything but an array as "no candidates".
 * Reasoning filters may answer with free text or nothing at all.
 */
export function toCollection<T>(result: FilterResult<T>): T[] {
  return Array.isArray(result) ? result : [];
}

/**
 * Shared stage machine for the trade and market-creation pipelines.
 *
 *   FETCH → FILTER_CANDIDATES → MAP → FILTER_RESULTS → DECIDE
 *
 * Each stage logs its output count. An empty shortlist ends the call
 * with an `empty` outcome and one failed audit record; it is not retried.
 * Any exception from a collaborator is recorded as a failed attempt and
 * the whole sequence restarts from FETCH, with exponential backoff,
 * until the retry policy's ceiling turns it into a `failed` outcome.
 */
export abstract class DecisionPipeline<D> {
  protected readonly feed: MarketDataFeed;
  protected readonly reasoning: ReasoningService;
  protected readonly audit: AuditLog;
  protected readonly log: Logger;
  private readonly retry: RetryPolicy;
  private readonly wait: (ms: number) => Promise<void>;

  /** Operation name used in log lines. */
  protected abstract readonly operation: string;

  constructor(deps: PipelineDeps) {
    this.feed = deps.feed;
    this.reasoning = deps.reasoning;
    this.audit = deps.audit;
    this.log = deps.log;
    this.retry = deps.retry ?? DEFAULT_RETRY_POLICY;
    this.wait = deps.sleep ?? sleep;
  }

  /** Side effects to run before every attempt. */
  protected async beforeAttempt(_attempt: number): Promise<void> {}

  /** Produces the decision and writes the success record. */
  protected abstract decide(shortlist: Shortlist, counts: PipelineCounts, attempt: number): Promise<D>;

  /** Writes the record for an attempt that ended without a decision. */
  protected abstract recordUnsuccessful(
    counts: PipelineCounts,
    error: string,
    attempt: number,
    retriesExhausted: boolean,
  ): Promise<void>;

  async run(): Promise<PipelineOutcome<D>> {
    for (let attempt = 1; ; attempt++) {
      const counts = emptyCounts();
      try {
        return await this.attempt(counts, attempt);
      } catch (err: unknown) {
        const error = errorMessage(err);
        const exhausted = isFinalAttempt(this.retry, attempt);
        this.log.error({ err, attempt, operation: this.operation }, `Error in ${this.operation}`);
        await this.recordUnsuccessful(counts, error, attempt, exhausted);

        if (exhausted) {
          this.log.error({ attempts: attempt, operation: this.operation }, 'Retry limit reached, giving up');
          return { status: 'failed', counts, error, attempts: attempt };
        }

        const delayMs = backoffDelay(this.retry, attempt);
        this.log.info({ attempt, delayMs, operation: this.operation }, 'Retrying...');
        await this.wait(delayMs);
      }
    }
  }

  /**
   * One pass through the stages. `counts` is filled in as stages complete
   * so a failure record can show how far the attempt got.
   */
  private async attempt(counts: PipelineCounts, attempt: number): Promise<PipelineOutcome<D>> {
    await this.beforeAttempt(attempt);

    const events = await this.feed.getAllTradeableEvents();
    counts.events_count = events.length;
    this.progress('fetch', events.length, attempt, 'Found events');

    const filteredEvents = toCollection(await this.reasoning.filterEventsByRelevance(events));
    counts.filtered_events_count = filteredEvents.length;
    this.progress('filter_candidates', filteredEvents.length, attempt, 'Filtered events');
    this.checkMonotone('filter_candidates', events.length, filteredEvents.length);

    const markets = await this.reasoning.mapEventsToMarkets(filteredEvents);
    counts.markets_count = markets.length;
    this.progress('map', markets.length, attempt, 'Found markets');

    const filteredMarkets = toCollection(await this.reasoning.filterMarketsByQuality(markets));
    counts.filtered_markets_count = filteredMarkets.length;
    this.progress('filter_results', filteredMarkets.length, attempt, 'Filtered markets');
    this.checkMonotone('filter_results', markets.length, filteredMarkets.length);

    const [first] = filteredMarkets;
    if (first === undefined) {
      this.log.warn({ attempt, operation: this.operation }, NO_CANDIDATES_ERROR);
      await this.recordUnsuccessful(counts, NO_CANDIDATES_ERROR, attempt, false);
      return { status: 'empty', counts, attempts: attempt };
    }

    const decision = await this.decide({ first, all: filteredMarkets }, counts, attempt);
    return { status: 'success', counts, decision, attempts: attempt };
  }

  private progress(stage: PipelineStage, count: number, attempt: number, message: string): void {
    this.log.info({ stage, count, attempt, operation: this.operation }, message);
  }

  private checkMonotone(stage: PipelineStage, before: number, after: number): void {
    if (after > before) {
      this.log.warn({ stage, before, after }, 'Filter stage increased the candidate count');
    }
  }
}
