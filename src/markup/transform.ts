import type { NodeCounts, SsmlNode, SsmlTagNode } from "../core/types.js";

export type TagVisitor = (tag: SsmlTagNode) => SsmlNode;

const mapChildren = (nodes: readonly SsmlNode[], visitor: TagVisitor): SsmlNode[] => {
  const mapped: SsmlNode[] = [];
  for (const child of nodes) {
    mapped.push(mapSsmlTags(child, visitor));
  }
  return mapped;
};

/**
 * Returns a copy of `node` in which every tag is replaced by `visitor(tag)`.
 * Children are visited before their parent, so the visitor sees a tag whose
 * children are already replaced. The input tree is left as it was.
 */
export const mapSsmlTags = (node: SsmlNode, visitor: TagVisitor): SsmlNode => {
  if (node.kind === "text") {
    return node;
  }
  return visitor({
    ...node,
    children: mapChildren(node.children, visitor),
  });
};

/** Text a synthesizer would speak: every text value in document order. */
export const extractSpeechText = (node: SsmlNode): string => {
  if (node.kind === "text") {
    return node.value;
  }
  return node.children.map(extractSpeechText).join("");
};

export const countNodes = (node: SsmlNode): NodeCounts => {
  if (node.kind === "text") {
    return { tags: 0, texts: 1 };
  }
  const counts: NodeCounts = { tags: 1, texts: 0 };
  for (const child of node.children) {
    const childCounts = countNodes(child);
    counts.tags += childCounts.tags;
    counts.texts += childCounts.texts;
  }
  return counts;
};
