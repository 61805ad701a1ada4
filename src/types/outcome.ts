/**
 * Per-item download outcomes.
 * Appended to the success or failure log; never mutated afterwards.
 */

/** Network strategies, in the order the chain tries them. */
export const STRATEGY_NAMES = ["primary", "search-referer", "publisher-referer"] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/** Where a successful artifact came from. */
export type ArtifactSource = StrategyName | "existing";

export interface AttemptFailure {
  readonly strategy: StrategyName;
  readonly reason: string;
}

interface OutcomeBase {
  readonly topicSlug: string;
  readonly titleSlug: string;
  /** Display title as given in the records file */
  readonly title: string;
}

export interface SuccessOutcome extends OutcomeBase {
  readonly kind: "success";
  /** Artifact path on disk */
  readonly path: string;
  readonly source: ArtifactSource;
}

export interface FailureOutcome extends OutcomeBase {
  readonly kind: "failure";
  /** Original link, kept for manual retrieval */
  readonly link: string;
  readonly attempts: readonly AttemptFailure[];
  /** Cause when the item failed before any network attempt */
  readonly reason?: string;
}

export type Outcome = SuccessOutcome | FailureOutcome;
