import type { ExternalId } from "./types.js";

export interface FieldError {
  path: string;
  message: string;
}

export type IndexErrorCode =
  | "MISSING_IDENTIFIER"
  | "DUPLICATE_IDENTIFIER"
  | "UNKNOWN_IDENTIFIER"
  | "MALFORMED_PAYLOAD"
  | "INVALID_CONFIG"
  | "INVALID_ARGUMENT";

export interface IndexErrorParams {
  code: IndexErrorCode;
  detail: string;
  externalId?: ExternalId;
  errors?: FieldError[];
  cause?: unknown;
}

/**
 * Recoverable failure raised by index operations.
 *
 * `message` carries the detail; `title` is the stable human label for `code`.
 */
export class IndexError extends Error {
  readonly code: IndexErrorCode;
  readonly title: string;
  readonly externalId?: ExternalId;
  readonly errors?: FieldError[];

  constructor(params: IndexErrorParams) {
    super(params.detail, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "IndexError";
    this.code = params.code;
    this.title = codeToTitle(params.code);
    this.externalId = params.externalId;
    this.errors = params.errors;
  }
}

export function isIndexError(e: unknown, code?: IndexErrorCode): e is IndexError {
  return e instanceof IndexError && (code === undefined || e.code === code);
}

function codeToTitle(code: IndexErrorCode): string {
  switch (code) {
    case "MISSING_IDENTIFIER":
      return "Missing identifier";
    case "DUPLICATE_IDENTIFIER":
      return "Duplicate identifier";
    case "UNKNOWN_IDENTIFIER":
      return "Unknown identifier";
    case "MALFORMED_PAYLOAD":
      return "Malformed payload";
    case "INVALID_CONFIG":
      return "Invalid configuration";
    case "INVALID_ARGUMENT":
      return "Invalid argument";
  }
}
