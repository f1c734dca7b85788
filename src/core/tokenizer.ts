import type { Term } from "./types.js";

/**
 * Turns text into index terms.
 *
 * Contract notes:
 * - must be deterministic; indexing and querying share one instance
 * - results keep duplicates and text order, callers dedupe where needed
 */
export interface Tokenizer {
  /** Substring-derived terms used for partial matching. */
  grams(text: string): Term[];
  /** Normalized whole-word terms used for exact term matching. */
  words(text: string): Term[];
}
