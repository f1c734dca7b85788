import { isIndexError } from "../errors.js";
import type { DocumentStore } from "../documentStore.js";
import type { FuzzyMatcher } from "../fuzzyMatcher.js";
import type { Comparator, TopKSelector } from "../heap.js";
import type { InvertedIndex } from "../invertedIndex.js";
import type { Logger } from "../logger.js";
import type { RankOptions, Ranker } from "../ranker.js";
import type { Tokenizer } from "../tokenizer.js";
import type { Document, InternalId, RankedCandidate, ScoredCandidate } from "../types.js";
import { extractFields } from "./fieldExtractor.js";
import { parseDocument } from "./payload.js";

export interface RankerDeps {
  tokenizer: Tokenizer;
  index: InvertedIndex;
  store: DocumentStore;
  matcher: FuzzyMatcher;
  topK: TopKSelector<RankedCandidate>;
  logger: Logger;
  fields: readonly string[];
  /** keep candidates scoring at least `highest * pruneRatio` */
  pruneRatio: number;
}

/** Fuzzy score first, then coarse score, then oldest document. */
export const byRank: Comparator<RankedCandidate> = (a, b) =>
  b.score - a.score || b.coarseScore - a.coarseScore || a.docId - b.docId;

/**
 * Drops candidates below `highest * ratio`; the rest come back sorted by
 * coarse score, highest first.
 */
export function pruneCandidates(scores: Map<InternalId, number>, ratio: number): ScoredCandidate[] {
  const candidates: ScoredCandidate[] = [];
  for (const [docId, coarseScore] of scores) candidates.push({ docId, coarseScore });
  candidates.sort((a, b) => b.coarseScore - a.coarseScore || a.docId - b.docId);

  const best = candidates[0];
  if (!best) return candidates;
  const threshold = best.coarseScore * ratio;
  return candidates.filter((c) => c.coarseScore >= threshold);
}

/**
 * Two-stage ranker:
 * - candidate generation by summing posting weights over raw query terms
 * - coarse prune relative to the best candidate
 * - fuzzy rerank of survivors against their stored field text
 */
export class FuzzyRanker implements Ranker {
  constructor(private readonly deps: RankerDeps) {}

  collect(query: string): Map<InternalId, number> {
    const { tokenizer, index } = this.deps;
    const scores = new Map<InternalId, number>();

    // query terms are not deduplicated
    const terms = [...tokenizer.grams(query), ...tokenizer.words(query)];
    for (const term of terms) {
      const postings = index.getPostings(term);
      if (!postings) continue;
      for (const p of postings) {
        scores.set(p.docId, (scores.get(p.docId) ?? 0) + p.weight);
      }
    }

    return scores;
  }

  prune(scores: Map<InternalId, number>): ScoredCandidate[] {
    return pruneCandidates(scores, this.deps.pruneRatio);
  }

  rerank(query: string, candidates: ScoredCandidate[]): RankedCandidate[] {
    const { store, matcher, fields, logger } = this.deps;
    const ranked: RankedCandidate[] = [];

    for (const c of candidates) {
      const payload = store.payload(c.docId);
      if (payload === undefined) continue;

      let doc: Document;
      try {
        doc = parseDocument(payload);
      } catch (e) {
        if (!isIndexError(e, "MALFORMED_PAYLOAD")) throw e;
        logger.warn("skipping candidate with malformed payload", {
          docId: c.docId,
          id: store.externalIdOf(c.docId),
          reason: e.message,
        });
        continue;
      }

      const match = matcher.bestMatch(query, extractFields(doc, fields));
      if (!match) continue;

      ranked.push({ docId: c.docId, coarseScore: c.coarseScore, score: match.score, document: doc });
    }

    return ranked;
  }

  rank(query: string, options?: RankOptions): RankedCandidate[] {
    const scores = this.collect(query);
    if (scores.size === 0) return [];

    const candidates = this.prune(scores);
    this.deps.logger.debug(`${candidates.length} candidates`, { query, matched: scores.size });

    let ranked: RankedCandidate[];
    try {
      ranked = this.rerank(query, candidates);
    } finally {
      this.deps.matcher.release?.();
    }

    if (options?.limit !== undefined) {
      return this.deps.topK.topK(ranked, options.limit, byRank);
    }
    return ranked.sort(byRank);
  }
}
