import type { ZodIssue } from "zod";
import type { FieldError } from "./errors.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

/** Maps zod issues to `$.a.b[0]`-style field errors. */
export function toFieldErrors(issues: readonly ZodIssue[]): FieldError[] {
  return issues.map((issue) => ({ path: toPath(issue.path), message: issue.message }));
}

function toPath(segments: ReadonlyArray<string | number>): string {
  let out = "$";
  for (const s of segments) out += typeof s === "number" ? `[${s}]` : `.${s}`;
  return out;
}
