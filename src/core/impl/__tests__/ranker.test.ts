import { describe, expect, it, vi } from "vitest";

import { silentLogger } from "../../logger.js";
import type { FuzzyMatch } from "../../fuzzyMatcher.js";
import type { Tokenizer } from "../../tokenizer.js";
import type { RankedCandidate } from "../../types.js";
import {
  FuzzyRanker,
  MemoryDocumentStore,
  MemoryInvertedIndex,
  MinHeapTopKSelector,
  indexItem,
  pruneCandidates,
} from "../index.js";

/** Splits on whitespace and emits no grams, so postings are fully controlled. */
const wordsOnly: Tokenizer = {
  grams: () => [],
  words: (text) => text.split(/\s+/).filter(Boolean),
};

function setup(bestMatch: (query: string, haystack: string) => FuzzyMatch | undefined, pruneRatio = 0.5) {
  const index = new MemoryInvertedIndex();
  const store = new MemoryDocumentStore();
  const matcher = { bestMatch: vi.fn(bestMatch), release: vi.fn() };
  const warn = vi.fn();
  const ranker = new FuzzyRanker({
    tokenizer: wordsOnly,
    index,
    store,
    matcher,
    topK: new MinHeapTopKSelector<RankedCandidate>(),
    logger: { ...silentLogger, warn },
    fields: ["body"],
    pruneRatio,
  });

  const x = store.assign("x");
  store.put(x, JSON.stringify({ _id: "x", body: "x text" }));
  const y = store.assign("y");
  store.put(y, JSON.stringify({ _id: "y", body: "y text" }));

  return { index, store, matcher, warn, ranker, x, y };
}

describe("pruneCandidates", () => {
  it("keeps candidates within half of the best score", () => {
    const scores = new Map([
      [0, 100],
      [1, 40],
      [2, 50],
    ]);
    expect(pruneCandidates(scores, 0.5)).toEqual([
      { docId: 0, coarseScore: 100 },
      { docId: 2, coarseScore: 50 },
    ]);
  });

  it("returns nothing for no scores", () => {
    expect(pruneCandidates(new Map(), 0.5)).toEqual([]);
  });
});

describe("FuzzyRanker", () => {
  it("sums weights without deduplicating query terms", () => {
    const { index, ranker, x } = setup(() => ({ score: 1 }));
    indexItem({ tokenizer: wordsOnly, index, weights: { gram: 1, word: 50 } }, x, "fox");

    expect(ranker.collect("fox")).toEqual(new Map([[x, 50]]));
    expect(ranker.collect("fox fox")).toEqual(new Map([[x, 100]]));
    expect(ranker.collect("wolf")).toEqual(new Map());
  });

  it("prunes a weak candidate before the fuzzy pass", () => {
    const { index, ranker, matcher, x, y } = setup(() => ({ score: 0.7 }));
    index.addPosting("alpha", x, 60);
    index.addPosting("beta", x, 40);
    index.addPosting("alpha", y, 40);

    const scores = ranker.collect("alpha beta");
    expect(scores.get(x)).toBe(100);
    expect(scores.get(y)).toBe(40);

    const ranked = ranker.rank("alpha beta");
    expect(ranked).toEqual([
      { docId: x, coarseScore: 100, score: 0.7, document: { _id: "x", body: "x text" } },
    ]);
    expect(matcher.bestMatch).toHaveBeenCalledTimes(1);
    expect(matcher.bestMatch).toHaveBeenCalledWith("alpha beta", "x text ");
  });

  it("drops candidates the matcher cannot align", () => {
    const { index, ranker, x, y } = setup((_q, haystack) => (haystack.startsWith("x") ? { score: 1 } : undefined));
    index.addPosting("alpha", x, 50);
    index.addPosting("alpha", y, 50);

    expect(ranker.rank("alpha").map((c) => c.docId)).toEqual([x]);
  });

  it("orders survivors by fuzzy score and honours a limit", () => {
    const { index, ranker, x, y } = setup((_q, haystack) => ({ score: haystack.startsWith("y") ? 0.9 : 0.2 }));
    index.addPosting("alpha", x, 50);
    index.addPosting("alpha", y, 50);

    expect(ranker.rank("alpha").map((c) => c.docId)).toEqual([y, x]);
    expect(ranker.rank("alpha", { limit: 1 }).map((c) => c.docId)).toEqual([y]);
  });

  it("releases matcher state after every ranking pass", () => {
    const { index, ranker, matcher, x } = setup(() => ({ score: 1 }));
    index.addPosting("alpha", x, 50);

    ranker.rank("alpha");
    ranker.rank("alpha", { limit: 1 });

    expect(matcher.release).toHaveBeenCalledTimes(2);
  });

  it("skips and logs a candidate whose payload cannot be parsed", () => {
    const { index, store, ranker, warn, x, y } = setup(() => ({ score: 1 }));
    index.addPosting("alpha", x, 50);
    index.addPosting("alpha", y, 50);
    store.put(y, "[1, 2]");

    expect(ranker.rank("alpha").map((c) => c.docId)).toEqual([x]);
    expect(warn).toHaveBeenCalledWith(
      "skipping candidate with malformed payload",
      { docId: y, id: "y", reason: "stored payload is not an object" },
    );
  });
});
