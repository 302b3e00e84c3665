export * from "./attributes.js";
export * from "./entities.js";
export * from "./equality.js";
export * from "./location.js";
export * from "./nodes.js";
export * from "./parser.js";
export * from "./serializer.js";
export * from "./transform.js";
export * from "./well-formed.js";
