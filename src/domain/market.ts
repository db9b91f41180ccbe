/**
 * Domain objects sourced from the upstream market feed.
 *
 * The decision pipeline treats these as opaque: it counts them, hands them
 * to collaborators, and picks the first one when it must choose. Only the
 * command surface and the audit summaries look at individual fields.
 */

/** A tradeable event grouping one or more markets. */
export interface FeedEvent {
  readonly id: string;
  readonly title: string;
  readonly description?: string | undefined;
  /** Ids of the markets listed under this event. */
  readonly markets: readonly string[];
}

/** A single binary or multi-outcome market. */
export interface FeedMarket {
  readonly id: string;
  readonly question: string;
  readonly description?: string | undefined;
  readonly outcomes: readonly string[];
  readonly outcome_prices: readonly number[];
  readonly spread?: number | undefined;
  readonly volume_24hr?: number | undefined;
}

/** A news article returned by the news collaborator. */
export interface NewsArticle {
  readonly title: string;
  readonly source: string | null;
  readonly url: string;
  readonly description?: string | null | undefined;
  readonly published_at?: string | null | undefined;
}
