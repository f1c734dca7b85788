import { z } from "zod";

import { IndexError } from "../errors.js";
import type { Document } from "../types.js";

const DocumentSchema = z.record(z.string(), z.unknown());

/** Serializes a document for storage. */
export function serializeDocument(doc: Document): string {
  try {
    return JSON.stringify(doc);
  } catch (e) {
    throw new IndexError({ code: "MALFORMED_PAYLOAD", detail: "document cannot be serialized", cause: e });
  }
}

/** Re-materializes a stored payload; anything but a JSON object is malformed. */
export function parseDocument(payload: string): Document {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (e) {
    throw new IndexError({ code: "MALFORMED_PAYLOAD", detail: "stored payload is not valid JSON", cause: e });
  }

  const parsed = DocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IndexError({ code: "MALFORMED_PAYLOAD", detail: "stored payload is not an object" });
  }
  return parsed.data;
}
