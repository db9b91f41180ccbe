/**
 * Values threaded through one decision-pipeline invocation.
 *
 * Stage order: FETCH → FILTER_CANDIDATES → MAP → FILTER_RESULTS → DECIDE.
 * Filter stages never increase a count, so for a well-behaved run
 * `filtered_events_count <= events_count` and
 * `filtered_markets_count <= markets_count`.
 */

export type PipelineStage =
  | 'fetch'
  | 'filter_candidates'
  | 'map'
  | 'filter_results'
  | 'decide';

/** Stage counts; `null` means the stage was not reached. */
export interface PipelineCounts {
  events_count: number | null;
  filtered_events_count: number | null;
  markets_count: number | null;
  filtered_markets_count: number | null;
}

export function emptyCounts(): PipelineCounts {
  return {
    events_count: null,
    filtered_events_count: null,
    markets_count: null,
    filtered_markets_count: null,
  };
}

/** Error string recorded when the second filter leaves nothing to decide on. */
export const NO_CANDIDATES_ERROR = 'No markets found after filtering';

/**
 * Terminal result of a pipeline call.
 *
 * - `success`: a decision was produced and recorded.
 * - `empty`: the filters left no candidates; recorded, not retried.
 * - `failed`: every allowed attempt raised; the last record is marked
 *   `retries_exhausted`.
 */
export type PipelineOutcome<D> =
  | { readonly status: 'success'; readonly counts: PipelineCounts; readonly decision: D; readonly attempts: number }
  | { readonly status: 'empty'; readonly counts: PipelineCounts; readonly attempts: number }
  | { readonly status: 'failed'; readonly counts: PipelineCounts; readonly error: string; readonly attempts: number };

/** Decision produced by the trade-selection pipeline. */
export interface TradeDecision {
  readonly market_id: string;
  readonly best_trade: string;
  readonly amount: number;
}
