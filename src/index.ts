export * from "./core/impl/index.js";

export type { Document, ExternalId, InternalId, Posting, RankedCandidate, ScoredCandidate, SearchHit, Term } from "./core/types.js";
export type { Tokenizer } from "./core/tokenizer.js";
export type { InvertedIndex, IndexStats } from "./core/invertedIndex.js";
export type { DocumentStore } from "./core/documentStore.js";
export type { FuzzyMatch, FuzzyMatcher } from "./core/fuzzyMatcher.js";
export type { Ranker, RankOptions } from "./core/ranker.js";
export type { Comparator, TopKSelector } from "./core/heap.js";

export { IndexError, isIndexError, type FieldError, type IndexErrorCode } from "./core/errors.js";
export {
  IndexOptionsSchema,
  SearchOptionsSchema,
  resolveIndexOptions,
  resolveSearchOptions,
  type IndexOptions,
  type IndexOptionsInput,
  type SearchOptions,
} from "./core/config.js";
export { createConsoleLogger, silentLogger, type Logger, type LogLevel, type LogMeta } from "./core/logger.js";
