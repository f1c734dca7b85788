export interface FuzzyMatch {
  /** higher is better */
  score: number;
}

/**
 * Scores how well `query` aligns against `haystack`.
 * `undefined` means no alignment exists at all.
 */
export interface FuzzyMatcher {
  bestMatch(query: string, haystack: string): FuzzyMatch | undefined;
  /** Drops anything the matcher cached while scoring. Called after every ranking pass. */
  release?(): void;
}
