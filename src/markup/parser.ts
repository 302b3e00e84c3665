import { SsmlError } from "../core/errors.js";
import type { SsmlNode, SsmlTagNode } from "../core/types.js";
import { parseAttributes, splitTagInterior } from "./attributes.js";
import { decodeEntities } from "./entities.js";
import { spanOf } from "./location.js";
import { createText } from "./nodes.js";

export const ROOT_TAG_NAME = "speak";

interface MutableTag {
  kind: "tag";
  name: string;
  attributes: Map<string, string>;
  children: SsmlNode[];
}

// Offsets of the `<...>` that opened a tag; spans are derived only on error.
interface OpenFrame {
  tag: MutableTag;
  start: number;
  end: number;
}

const readTag = (interior: string, markup: string, start: number, end: number): MutableTag => {
  const locate = () => spanOf(markup, start, end);
  const { name } = splitTagInterior(interior);
  if (name.length === 0) {
    throw new SsmlError("EMPTY_TAG_NAME", "Tag has no name.", locate());
  }
  return {
    kind: "tag",
    name,
    attributes: parseAttributes(interior, locate),
    children: [],
  };
};

/**
 * Parses SSML markup into its `<speak>` root.
 *
 * One left-to-right scan with an explicit stack of open tags. Blank text
 * runs are dropped; every other run becomes a decoded text child of the
 * innermost open tag. Throws `SsmlError` on the first violation.
 */
export const parseSsml = (markup: string): SsmlTagNode => {
  const stack: OpenFrame[] = [];
  let root: OpenFrame | null = null;
  let seenTopLevel = false;
  let cursor = 0;

  while (cursor < markup.length) {
    if (markup[cursor] !== "<") {
      const next = markup.indexOf("<", cursor);
      const end = next === -1 ? markup.length : next;
      const text = markup.slice(cursor, end);
      if (text.trim().length > 0) {
        if (stack.length === 0) {
          throw new SsmlError(
            "TEXT_OUTSIDE_ROOT",
            `Text ${JSON.stringify(text.trim())} appears outside the root tag.`,
            spanOf(markup, cursor, end)
          );
        }
        stack[stack.length - 1].tag.children.push(createText(decodeEntities(text)));
      }
      cursor = end;
      continue;
    }

    const close = markup.indexOf(">", cursor);
    if (close === -1) {
      throw new SsmlError(
        "UNTERMINATED_TAG",
        "Tag is missing its closing angle bracket.",
        spanOf(markup, cursor, markup.length)
      );
    }
    const start = cursor;
    const end = close + 1;
    const interior = markup.slice(start + 1, close).trim();
    cursor = end;

    if (interior.startsWith("/")) {
      const closingName = interior.slice(1).trim();
      const frame = stack.pop();
      if (!frame) {
        throw new SsmlError(
          "UNMATCHED_CLOSING_TAG",
          `Closing tag </${closingName}> has no open tag.`,
          spanOf(markup, start, end)
        );
      }
      if (frame.tag.name !== closingName) {
        throw new SsmlError(
          "MISMATCHED_CLOSING_TAG",
          `Closing tag </${closingName}> does not match <${frame.tag.name}>.`,
          spanOf(markup, start, end)
        );
      }
      if (stack.length > 0) {
        stack[stack.length - 1].tag.children.push(frame.tag);
        continue;
      }
      if (root) {
        throw new SsmlError(
          "MULTIPLE_TOP_LEVEL_ROOTS",
          "Markup has more than one top-level tag.",
          spanOf(markup, start, end)
        );
      }
      root = frame;
      seenTopLevel = true;
      continue;
    }

    if (interior.endsWith("/")) {
      if (stack.length === 0) {
        throw new SsmlError(
          "SELF_CLOSING_OUTSIDE_ROOT",
          `Self-closing tag <${interior}> cannot stand outside the root tag.`,
          spanOf(markup, start, end)
        );
      }
      stack[stack.length - 1].tag.children.push(readTag(interior.slice(0, -1), markup, start, end));
      continue;
    }

    const tag = readTag(interior, markup, start, end);
    if (stack.length === 0 && seenTopLevel) {
      throw new SsmlError(
        "MULTIPLE_TOP_LEVEL_ROOTS",
        `Tag <${tag.name}> opens after the top-level tag was closed.`,
        spanOf(markup, start, end)
      );
    }
    stack.push({ tag, start, end });
  }

  if (stack.length > 0) {
    const unclosed = stack[stack.length - 1];
    const names = stack.map((frame) => `<${frame.tag.name}>`).join(", ");
    throw new SsmlError(
      "UNCLOSED_TAGS",
      `Unclosed tags remain: ${names}.`,
      spanOf(markup, unclosed.start, unclosed.end)
    );
  }
  if (!root) {
    throw new SsmlError("MISSING_ROOT", `Markup has no <${ROOT_TAG_NAME}> root tag.`);
  }
  if (root.tag.name !== ROOT_TAG_NAME) {
    throw new SsmlError(
      "WRONG_ROOT_NAME",
      `Root tag must be <${ROOT_TAG_NAME}>, found <${root.tag.name}>.`,
      spanOf(markup, root.start, root.end)
    );
  }
  return root.tag;
};
