export const SSML_MARKUP_VERSION = "0.1.0";

export * from "./core/errors.js";
export type * from "./core/types.js";
export * from "./markup/index.js";
export * from "./cache/lru-cache.js";
export * from "./api.js";
