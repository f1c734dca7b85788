import { describe, expect, it } from "vitest";

import type { RankedCandidate } from "../../types.js";
import { byRank } from "../fuzzyRanker.js";
import { MinHeapTopKSelector } from "../minHeapTopK.js";

function candidate(docId: number, score: number, coarseScore: number): RankedCandidate {
  return { docId, score, coarseScore, document: { _id: String(docId) } };
}

describe("MinHeapTopKSelector", () => {
  it("returns best K by comparator", () => {
    const sel = new MinHeapTopKSelector<number>();
    const out = sel.topK([5, 1, 3, 2, 4], 3, (a, b) => b - a); // descending
    expect(out).toEqual([5, 4, 3]);
  });

  it("handles k of zero and k larger than the input", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([1, 2], 0, (a, b) => a - b)).toEqual([]);
    expect(sel.topK([3, 1, 2], 10, (a, b) => a - b)).toEqual([1, 2, 3]);
  });

  it("orders ranked candidates by fuzzy score, then coarse score, then id", () => {
    const sel = new MinHeapTopKSelector<RankedCandidate>();
    const out = sel.topK(
      [candidate(0, 0.5, 10), candidate(1, 0.9, 2), candidate(2, 0.5, 60), candidate(3, 0.5, 60)],
      3,
      byRank,
    );
    expect(out.map((c) => c.docId)).toEqual([1, 2, 3]);
  });
});
