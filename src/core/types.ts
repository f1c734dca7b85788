/** Shared core types used by module contracts. */

export type ExternalId = string;
/** Dense id assigned by the index at first ingestion; never reused. */
export type InternalId = number;
export type Term = string;

/** A structured record as callers hand it to the index. */
export type Document = Record<string, unknown>;

export interface Posting {
  docId: InternalId;
  weight: number;
}

export interface ScoredCandidate {
  docId: InternalId;
  /** summed posting weights from the token-overlap pass */
  coarseScore: number;
}

export interface RankedCandidate extends ScoredCandidate {
  /** fuzzy alignment score; higher is better */
  score: number;
  document: Document;
}

export interface SearchHit {
  id: ExternalId;
  score: number;
  document: Document;
}
