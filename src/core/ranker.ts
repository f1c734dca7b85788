import type { InternalId, RankedCandidate, ScoredCandidate } from "./types.js";

export interface RankOptions {
  /** If provided, keep only the best `limit` candidates. */
  limit?: number;
}

/**
 * Scores stored documents for a query.
 *
 * Phase 1 sums posting weights and prunes; phase 2 reranks the survivors
 * by fuzzy alignment against their reconstructed text.
 */
export interface Ranker {
  /** Token-overlap scores per document. Query terms are not deduplicated. */
  collect(query: string): Map<InternalId, number>;
  prune(scores: Map<InternalId, number>): ScoredCandidate[];
  rerank(query: string, candidates: ScoredCandidate[]): RankedCandidate[];

  rank(query: string, options?: RankOptions): RankedCandidate[];
}
