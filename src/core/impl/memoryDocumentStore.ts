import { IndexError } from "../errors.js";
import type { DocumentStore } from "../documentStore.js";
import type { ExternalId, InternalId } from "../types.js";

export class MemoryDocumentStore implements DocumentStore {
  private nextId: InternalId = 0;
  private readonly idMap = new Map<ExternalId, InternalId>();
  private readonly reverse = new Map<InternalId, ExternalId>();
  private readonly items = new Map<InternalId, string>();

  get size(): number {
    return this.idMap.size;
  }

  assign(externalId: ExternalId): InternalId {
    if (this.idMap.has(externalId)) {
      throw new IndexError({
        code: "DUPLICATE_IDENTIFIER",
        detail: `document "${externalId}" already exists`,
        externalId,
      });
    }

    const docId = this.nextId++;
    this.idMap.set(externalId, docId);
    this.reverse.set(docId, externalId);
    return docId;
  }

  resolve(externalId: ExternalId): InternalId | undefined {
    return this.idMap.get(externalId);
  }

  externalIdOf(docId: InternalId): ExternalId | undefined {
    return this.reverse.get(docId);
  }

  put(docId: InternalId, payload: string): void {
    if (!this.reverse.has(docId)) {
      throw new RangeError(`internal id ${docId} has no identity mapping`);
    }
    this.items.set(docId, payload);
  }

  payload(docId: InternalId): string | undefined {
    return this.items.get(docId);
  }

  delete(externalId: ExternalId): InternalId | undefined {
    const docId = this.idMap.get(externalId);
    if (docId === undefined) return undefined;

    this.idMap.delete(externalId);
    this.reverse.delete(docId);
    this.items.delete(docId);
    return docId;
  }

  entries(): IterableIterator<[InternalId, string]> {
    return this.items.entries();
  }

  clear(): void {
    this.nextId = 0;
    this.idMap.clear();
    this.reverse.clear();
    this.items.clear();
  }
}
