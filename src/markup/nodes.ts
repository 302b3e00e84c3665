import { SsmlError } from "../core/errors.js";
import type { SsmlAttributesInit, SsmlNode, SsmlTagNode, SsmlTextNode } from "../core/types.js";

const isEntryIterable = (
  init: SsmlAttributesInit
): init is Iterable<readonly [string, string]> => Symbol.iterator in init;

export const toAttributeMap = (init: SsmlAttributesInit = {}): Map<string, string> => {
  if (isEntryIterable(init)) {
    return new Map(init);
  }
  return new Map(Object.entries(init));
};

export const createText = (value: string): SsmlTextNode => ({ kind: "text", value });

/**
 * Builds a tag node. The name is trimmed; attribute order follows `attributes`.
 */
export const createTag = (
  name: string,
  attributes?: SsmlAttributesInit,
  children: readonly SsmlNode[] = []
): SsmlTagNode => {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new SsmlError("EMPTY_TAG_NAME", "Tag name cannot be empty.");
  }
  return {
    kind: "tag",
    name: trimmed,
    attributes: toAttributeMap(attributes),
    children: [...children],
  };
};

export const isTag = (node: SsmlNode): node is SsmlTagNode => node.kind === "tag";

export const isText = (node: SsmlNode): node is SsmlTextNode => node.kind === "text";
