import assert from "node:assert/strict";

import { SsmlError } from "../src/core/errors.js";

export const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof SsmlError);
    assert.equal(error.code, code);
    return true;
  });
};

export const expectCliCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof Error);
    assert.ok("code" in error);
    assert.equal(error.code, code);
    return true;
  });
};
