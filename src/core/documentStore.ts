import type { ExternalId, InternalId } from "./types.js";

/**
 * Identity map plus serialized payload storage.
 *
 * Every internal id holding a payload has exactly one external id, and the
 * other way round.
 */
export interface DocumentStore {
  readonly size: number;

  /** Reserves the next internal id for `externalId`. Throws on duplicates. */
  assign(externalId: ExternalId): InternalId;
  resolve(externalId: ExternalId): InternalId | undefined;
  externalIdOf(docId: InternalId): ExternalId | undefined;

  put(docId: InternalId, payload: string): void;
  payload(docId: InternalId): string | undefined;

  /** Drops both the mapping and the payload; returns the freed internal id. */
  delete(externalId: ExternalId): InternalId | undefined;
  /** Payloads in store order. */
  entries(): IterableIterator<[InternalId, string]>;

  /** Empties the store and resets the id counter. */
  clear(): void;
}
