import {
  resolveIndexOptions,
  resolveSearchOptions,
  type IndexOptions,
  type IndexOptionsInput,
  type SearchOptions,
} from "../config.js";
import { IndexError, isIndexError } from "../errors.js";
import type { DocumentStore } from "../documentStore.js";
import type { FuzzyMatcher } from "../fuzzyMatcher.js";
import type { TopKSelector } from "../heap.js";
import type { InvertedIndex } from "../invertedIndex.js";
import { createConsoleLogger, type Logger } from "../logger.js";
import type { Tokenizer } from "../tokenizer.js";
import type { Document, ExternalId, InternalId, RankedCandidate, SearchHit } from "../types.js";
import { asString, isRecord } from "../validation.js";
import { extractFields } from "./fieldExtractor.js";
import { FuzzyRanker } from "./fuzzyRanker.js";
import { FuzzysortMatcher } from "./fuzzysortMatcher.js";
import { indexItem } from "./indexer.js";
import { MemoryDocumentStore } from "./memoryDocumentStore.js";
import { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { NGramTokenizer } from "./ngramTokenizer.js";
import { parseDocument, serializeDocument } from "./payload.js";
import { QueryLog, type QueryTiming } from "./queryLog.js";

export interface IndexDeps {
  tokenizer: Tokenizer;
  index: InvertedIndex;
  store: DocumentStore;
  matcher: FuzzyMatcher;
  topK: TopKSelector<RankedCandidate>;
  logger: Logger;
}

export interface FuzzyIndexStats {
  documents: number;
  terms: number;
  postings: number;
  recentQueries: QueryTiming[];
}

/**
 * In-memory full-text index over a fixed set of document fields.
 *
 * Single owner, synchronous: callers that share an instance across writers
 * must serialize access themselves.
 */
export class FuzzyIndex {
  readonly options: IndexOptions;

  private readonly deps: IndexDeps;
  private readonly ranker: FuzzyRanker;
  private readonly queryLog: QueryLog;

  constructor(options: IndexOptionsInput, deps: Partial<IndexDeps> = {}) {
    this.options = resolveIndexOptions(options);
    this.deps = {
      tokenizer: deps.tokenizer ?? new NGramTokenizer(this.options.gramSize),
      index: deps.index ?? new MemoryInvertedIndex(),
      store: deps.store ?? new MemoryDocumentStore(),
      matcher: deps.matcher ?? new FuzzysortMatcher(),
      topK: deps.topK ?? new MinHeapTopKSelector<RankedCandidate>(),
      logger: deps.logger ?? createConsoleLogger(this.options.logLevel),
    };
    this.ranker = new FuzzyRanker({
      ...this.deps,
      fields: this.options.fields,
      pruneRatio: this.options.pruneRatio,
    });
    this.queryLog = new QueryLog(this.options.queryLogSize);
  }

  get fields(): readonly string[] {
    return this.options.fields;
  }

  get size(): number {
    return this.deps.store.size;
  }

  /** Drops every document and resets id assignment; fields are kept. */
  clear(): void {
    this.deps.store.clear();
    this.deps.index.clear();
    this.deps.matcher.release?.();
    this.queryLog.clear();
  }

  addObject(doc: unknown): InternalId {
    const { record, id } = this.identify(doc);
    return this.add(id, serializeDocument(record), extractFields(record, this.fields).trim());
  }

  addMany(docs: Iterable<unknown>): InternalId[] {
    const ids: InternalId[] = [];
    for (const doc of docs) ids.push(this.addObject(doc));
    return ids;
  }

  update(doc: unknown): InternalId {
    const { record, id } = this.identify(doc);
    const docId = this.deps.store.resolve(id);
    if (docId === undefined) {
      throw new IndexError({ code: "UNKNOWN_IDENTIFIER", detail: `document "${id}" does not exist`, externalId: id });
    }

    const payload = serializeDocument(record);
    this.deps.index.removeDocument(docId);
    this.deps.store.put(docId, payload);
    this.indexText(docId, extractFields(record, this.fields).trim());
    return docId;
  }

  /** Updates a known document, adds an unknown one. */
  upsert(doc: unknown): InternalId {
    const { id } = this.identify(doc);
    return this.has(id) ? this.update(doc) : this.addObject(doc);
  }

  remove(id: ExternalId): boolean {
    const docId = this.deps.store.delete(id);
    if (docId === undefined) return false;

    this.deps.index.removeDocument(docId);
    return true;
  }

  has(id: ExternalId): boolean {
    return this.deps.store.resolve(id) !== undefined;
  }

  get(id: ExternalId): Document | undefined {
    const docId = this.deps.store.resolve(id);
    if (docId === undefined) return undefined;
    const payload = this.deps.store.payload(docId);
    return payload === undefined ? undefined : parseDocument(payload);
  }

  search(query: string, options?: SearchOptions): Document[] {
    return this.searchWithScores(query, options).map((h) => h.document);
  }

  /**
   * Blank queries list every stored document in store order, unranked and
   * with score 0. Anything else goes through the ranker. A `limit` that is
   * not a non-negative integer raises `INVALID_ARGUMENT`.
   */
  searchWithScores(rawQuery: string, options?: SearchOptions): SearchHit[] {
    const { limit } = resolveSearchOptions(options);
    const started = Date.now();
    const query = rawQuery.trim();

    const hits = query.length === 0 ? this.listAll(limit) : this.rankedHits(query, limit);

    this.queryLog.record({ at: started, tookMs: Date.now() - started });
    return hits;
  }

  stats(): FuzzyIndexStats {
    const { termCount, postingCount } = this.deps.index.getStats();
    return {
      documents: this.deps.store.size,
      terms: termCount,
      postings: postingCount,
      recentQueries: this.queryLog.recent(),
    };
  }

  private add(id: ExternalId, payload: string, text: string): InternalId {
    const docId = this.deps.store.assign(id);
    this.deps.store.put(docId, payload);
    this.indexText(docId, text);
    return docId;
  }

  private indexText(docId: InternalId, text: string): void {
    indexItem(
      { tokenizer: this.deps.tokenizer, index: this.deps.index, weights: this.options.weights },
      docId,
      text,
    );
  }

  private identify(doc: unknown): { record: Document; id: ExternalId } {
    if (!isRecord(doc)) {
      throw new IndexError({ code: "MALFORMED_PAYLOAD", detail: "document must be an object" });
    }
    const id = asString(doc[this.options.idField]);
    if (id === undefined) {
      throw new IndexError({
        code: "MISSING_IDENTIFIER",
        detail: `document field "${this.options.idField}" must be a string`,
      });
    }
    return { record: doc, id };
  }

  private rankedHits(query: string, limit?: number): SearchHit[] {
    const hits: SearchHit[] = [];
    for (const c of this.ranker.rank(query, { limit })) {
      const id = this.deps.store.externalIdOf(c.docId);
      if (id !== undefined) hits.push({ id, score: c.score, document: c.document });
    }
    return hits;
  }

  private listAll(limit?: number): SearchHit[] {
    const hits: SearchHit[] = [];
    for (const [docId, payload] of this.deps.store.entries()) {
      if (limit !== undefined && hits.length >= limit) break;

      const id = this.deps.store.externalIdOf(docId);
      if (id === undefined) continue;
      try {
        hits.push({ id, score: 0, document: parseDocument(payload) });
      } catch (e) {
        if (!isIndexError(e, "MALFORMED_PAYLOAD")) throw e;
        this.deps.logger.warn("skipping document with malformed payload", { docId, id, reason: e.message });
      }
    }
    return hits;
  }
}

export function createIndex(
  fields: readonly string[],
  options: Omit<IndexOptionsInput, "fields"> = {},
  deps: Partial<IndexDeps> = {},
): FuzzyIndex {
  return new FuzzyIndex({ ...options, fields: [...fields] }, deps);
}
