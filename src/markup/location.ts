import type { SourceLocation, SourceSpan } from "../core/types.js";

export const locationAt = (source: string, offset: number): SourceLocation => {
  const bounded = Math.max(0, Math.min(offset, source.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < bounded; i += 1) {
    if (source[i] === "\n") {
      line += 1;
      lineStart = i + 1;
    }
  }
  return { line, column: bounded - lineStart + 1 };
};

/** Span of `source.slice(start, end)`; `end` is exclusive. */
export const spanOf = (source: string, start: number, end: number): SourceSpan => {
  return {
    start: locationAt(source, start),
    end: locationAt(source, Math.max(start, end - 1)),
  };
};
