import type { SsmlNode, SsmlTagNode } from "../core/types.js";

const attributesEqual = (a: SsmlTagNode["attributes"], b: SsmlTagNode["attributes"]): boolean => {
  if (a.size !== b.size) {
    return false;
  }
  for (const [key, value] of a) {
    if (b.get(key) !== value) {
      return false;
    }
  }
  return true;
};

/** Structural equality. Attribute order is not compared. */
export const nodesEqual = (a: SsmlNode, b: SsmlNode): boolean => {
  if (a.kind === "text") {
    return b.kind === "text" && a.value === b.value;
  }
  if (b.kind === "text") {
    return false;
  }
  if (a.name !== b.name || a.children.length !== b.children.length) {
    return false;
  }
  if (!attributesEqual(a.attributes, b.attributes)) {
    return false;
  }
  for (let i = 0; i < a.children.length; i += 1) {
    if (!nodesEqual(a.children[i], b.children[i])) {
      return false;
    }
  }
  return true;
};
