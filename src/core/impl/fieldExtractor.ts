import type { Document } from "../types.js";
import { isRecord } from "../validation.js";

/**
 * Flattens the configured fields of a document into one text blob.
 *
 * - string: appended as is
 * - array: every string element
 * - object: every direct string member
 *
 * Only one level is walked; nested arrays and objects are skipped, as are
 * missing fields and any other value. Each appended piece is followed by a
 * space, so the result is untrimmed.
 */
export function extractFields(doc: Document, fields: readonly string[]): string {
  let out = "";

  for (const field of fields) {
    const value = doc[field];

    if (typeof value === "string") {
      out += value + " ";
    } else if (Array.isArray(value)) {
      for (const el of value) {
        if (typeof el === "string") out += el + " ";
      }
    } else if (isRecord(value)) {
      for (const el of Object.values(value)) {
        if (typeof el === "string") out += el + " ";
      }
    }
  }

  return out;
}
