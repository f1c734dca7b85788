import fuzzysort from "fuzzysort";

import type { FuzzyMatch, FuzzyMatcher } from "../fuzzyMatcher.js";

/**
 * Default matcher backed by fuzzysort; scores fall in (0, 1].
 *
 * Targets are prepared per call so fuzzysort's module-wide target cache never
 * holds document text; `release` clears its query cache.
 */
export class FuzzysortMatcher implements FuzzyMatcher {
  bestMatch(query: string, haystack: string): FuzzyMatch | undefined {
    const result = fuzzysort.single(query, fuzzysort.prepare(haystack));
    return result ? { score: result.score } : undefined;
  }

  release(): void {
    fuzzysort.cleanup();
  }
}
