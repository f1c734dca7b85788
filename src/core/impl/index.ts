export { extractFields } from "./fieldExtractor.js";
export { serializeDocument, parseDocument } from "./payload.js";
export { NGramTokenizer } from "./ngramTokenizer.js";
export { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
export { MemoryDocumentStore } from "./memoryDocumentStore.js";
export { indexItem, type IndexerDeps } from "./indexer.js";
export { FuzzysortMatcher } from "./fuzzysortMatcher.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { FuzzyRanker, pruneCandidates, byRank, type RankerDeps } from "./fuzzyRanker.js";
export { QueryLog, type QueryTiming } from "./queryLog.js";
export {
  FuzzyIndex,
  createIndex,
  type IndexDeps,
  type FuzzyIndexStats,
} from "./fuzzyIndex.js";
