import type { SourceSpan } from "./types.js";

export type SsmlErrorCode =
  | "UNTERMINATED_TAG"
  | "UNMATCHED_CLOSING_TAG"
  | "MISMATCHED_CLOSING_TAG"
  | "MULTIPLE_TOP_LEVEL_ROOTS"
  | "SELF_CLOSING_OUTSIDE_ROOT"
  | "TEXT_OUTSIDE_ROOT"
  | "UNCLOSED_TAGS"
  | "MISSING_ROOT"
  | "WRONG_ROOT_NAME"
  | "MALFORMED_ATTRIBUTE_SYNTAX"
  | "EMPTY_TAG_NAME"
  | "CACHE_INVALID_CAPACITY";

export class SsmlError extends Error {
  readonly code: SsmlErrorCode;
  readonly span?: SourceSpan;

  constructor(code: SsmlErrorCode, message: string, span?: SourceSpan) {
    super(message);
    this.name = "SsmlError";
    this.code = code;
    this.span = span;
  }
}

export const isSsmlError = (error: unknown): error is SsmlError => error instanceof SsmlError;
