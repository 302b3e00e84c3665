import assert from "node:assert/strict";
import { test } from "vitest";

import { SsmlError, isSsmlError } from "../../../src/core/errors.js";

test("SsmlError carries code and span", () => {
  const span = {
    start: { line: 1, column: 1 },
    end: { line: 1, column: 7 },
  };
  const error = new SsmlError("UNCLOSED_TAGS", "boom", span);
  assert.equal(error.name, "SsmlError");
  assert.equal(error.code, "UNCLOSED_TAGS");
  assert.equal(error.message, "boom");
  assert.deepEqual(error.span, span);
  assert.ok(error instanceof Error);
});

test("isSsmlError narrows only SsmlError instances", () => {
  assert.equal(isSsmlError(new SsmlError("MISSING_ROOT", "x")), true);
  assert.equal(isSsmlError(new Error("x")), false);
  assert.equal(isSsmlError({ code: "MISSING_ROOT" }), false);
});
