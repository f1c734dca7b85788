import type { InternalId, Posting, Term } from "./types.js";

export interface IndexStats {
  termCount: number;
  postingCount: number;
}

/**
 * Inverted index mapping term -> postings.
 *
 * Contract notes:
 * - `addPosting` is idempotent per (term, docId); the larger weight wins
 * - `getPostings` returns postings in insertion order
 * - `removeDocument` leaves no empty postings list behind
 */
export interface InvertedIndex {
  addPosting(term: Term, docId: InternalId, weight: number): void;
  /** Returns the number of postings dropped. */
  removeDocument(docId: InternalId): number;

  getPostings(term: Term): readonly Posting[] | undefined;

  clear(): void;
  getStats(): IndexStats;
}
