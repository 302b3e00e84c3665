import { SsmlError } from "../core/errors.js";
import type { SourceSpan } from "../core/types.js";

// key="value" with letters, digits, `_`, `:` and `-` in the key.
const ATTRIBUTE_RE = /([\p{L}\p{N}_:-]+)\s*=\s*"([^"]*)"/gu;
const WHITESPACE_RE = /\s/u;
const TOKEN_SEPARATOR_RE = /\s+/u;

export interface TagInterior {
  name: string;
  attributeText: string;
}

export const splitTagInterior = (interior: string): TagInterior => {
  const trimmed = interior.trim();
  const [name = ""] = trimmed.split(TOKEN_SEPARATOR_RE);
  return {
    name,
    attributeText: trimmed.slice(name.length).trim(),
  };
};

/**
 * Reads the attributes of a tag interior such as `break time="1s"`.
 *
 * The attribute text is not parsed by a grammar. Every `key="value"` match
 * marks its characters as covered, and any non-whitespace character left
 * uncovered makes the whole interior malformed. Single quotes are rejected
 * outright. `locate` is only called when an error is thrown.
 */
export const parseAttributes = (
  tagInterior: string,
  locate?: () => SourceSpan
): Map<string, string> => {
  if (tagInterior.includes("'")) {
    throw new SsmlError(
      "MALFORMED_ATTRIBUTE_SYNTAX",
      "Single-quoted attribute values are not allowed.",
      locate?.()
    );
  }

  const attributes = new Map<string, string>();
  const { attributeText } = splitTagInterior(tagInterior);
  if (attributeText.length === 0) {
    return attributes;
  }

  const matches = [...attributeText.matchAll(ATTRIBUTE_RE)];
  const covered = new Uint8Array(attributeText.length);
  for (const match of matches) {
    const start = match.index ?? 0;
    covered.fill(1, start, start + match[0].length);
  }

  for (let i = 0; i < attributeText.length; i += 1) {
    const char = attributeText[i];
    if (covered[i] === 0 && !WHITESPACE_RE.test(char)) {
      throw new SsmlError(
        "MALFORMED_ATTRIBUTE_SYNTAX",
        `Malformed attribute text near ${JSON.stringify(char)} at offset ${i} of ${JSON.stringify(attributeText)}.`,
        locate?.()
      );
    }
  }

  for (const match of matches) {
    attributes.set(match[1], match[2]);
  }
  return attributes;
};
