import type { InternalId, Posting, Term } from "../types.js";
import type { IndexStats, InvertedIndex } from "../invertedIndex.js";

/**
 * Simple in-memory inverted index.
 *
 * Data structure:
 * - term -> (docId -> weight)
 *
 * The inner map keeps insertion order and makes postings unique per
 * (term, docId). There is no reverse map, so `removeDocument` scans every
 * postings list.
 */
export class MemoryInvertedIndex implements InvertedIndex {
  private readonly termToDocMap = new Map<Term, Map<InternalId, number>>();

  addPosting(term: Term, docId: InternalId, weight: number): void {
    let docMap = this.termToDocMap.get(term);
    if (!docMap) {
      docMap = new Map();
      this.termToDocMap.set(term, docMap);
    }

    const prev = docMap.get(docId);
    if (prev === undefined || weight > prev) docMap.set(docId, weight);
  }

  removeDocument(docId: InternalId): number {
    let removed = 0;
    for (const [term, docMap] of this.termToDocMap) {
      if (docMap.delete(docId)) removed++;
      // deleting the current key while iterating a Map is safe
      if (docMap.size === 0) this.termToDocMap.delete(term);
    }
    return removed;
  }

  getPostings(term: Term): readonly Posting[] | undefined {
    const docMap = this.termToDocMap.get(term);
    if (!docMap) return undefined;

    const postings: Posting[] = [];
    for (const [docId, weight] of docMap) postings.push({ docId, weight });
    return postings;
  }

  clear(): void {
    this.termToDocMap.clear();
  }

  getStats(): IndexStats {
    let postingCount = 0;
    for (const docMap of this.termToDocMap.values()) postingCount += docMap.size;
    return { termCount: this.termToDocMap.size, postingCount };
  }
}
