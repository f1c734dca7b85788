import type { InternalId } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { InvertedIndex } from "../invertedIndex.js";

export interface IndexerDeps {
  tokenizer: Tokenizer;
  index: InvertedIndex;
  weights: { gram: number; word: number };
}

/** Adds one posting per distinct gram and per distinct word of `text`. */
export function indexItem(deps: IndexerDeps, docId: InternalId, text: string): void {
  const { tokenizer, index, weights } = deps;

  for (const gram of new Set(tokenizer.grams(text))) {
    index.addPosting(gram, docId, weights.gram);
  }

  for (const word of new Set(tokenizer.words(text))) {
    index.addPosting(word, docId, weights.word);
  }
}
