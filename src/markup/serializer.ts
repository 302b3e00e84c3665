import type { SsmlNode, SsmlTagNode } from "../core/types.js";
import { encodeEntities } from "./entities.js";

const renderAttributes = (attributes: SsmlTagNode["attributes"]): string => {
  const parts: string[] = [];
  for (const [key, value] of attributes) {
    parts.push(`${key}="${value}"`);
  }
  return parts.join(" ");
};

/**
 * Renders a node as canonical markup. Attribute values are written as stored;
 * text is entity-encoded. A tag whose children render to nothing is written
 * in self-closing form.
 */
export const renderSsml = (node: SsmlNode): string => {
  if (node.kind === "text") {
    return encodeEntities(node.value);
  }
  const attrs = renderAttributes(node.attributes);
  const children = node.children.map(renderSsml).join("");
  if (children.length === 0) {
    return attrs.length === 0 ? `<${node.name}/>` : `<${node.name} ${attrs}/>`;
  }
  const open = attrs.length === 0 ? node.name : `${node.name} ${attrs}`;
  return `<${open}>${children}</${node.name}>`;
};
