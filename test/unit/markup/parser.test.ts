import assert from "node:assert/strict";
import { test } from "vitest";

import { SsmlError } from "../../../src/core/errors.js";
import type { SsmlNode, SsmlTagNode } from "../../../src/core/types.js";
import { nodesEqual } from "../../../src/markup/equality.js";
import { ROOT_TAG_NAME, parseSsml } from "../../../src/markup/parser.js";
import { expectCode } from "../../helpers.js";

const asTag = (node: SsmlNode | undefined): SsmlTagNode => {
  assert.ok(node && node.kind === "tag");
  return node;
};

test("parseSsml builds a speak root with text and tag children in order", () => {
  const root = parseSsml('<speak>Hello <break time="1s"/>world</speak>');
  assert.equal(root.name, ROOT_TAG_NAME);
  assert.equal(root.attributes.size, 0);
  assert.equal(root.children.length, 3);
  assert.deepEqual(root.children[0], { kind: "text", value: "Hello " });
  const pause = asTag(root.children[1]);
  assert.equal(pause.name, "break");
  assert.equal(pause.attributes.get("time"), "1s");
  assert.equal(pause.children.length, 0);
  assert.deepEqual(root.children[2], { kind: "text", value: "world" });
});

test("parseSsml nests tags and drops blank text runs", () => {
  const root = parseSsml("<speak>\n  <p>\n    <s>hi</s>\n  </p>\n</speak>\n");
  assert.equal(root.children.length, 1);
  const paragraph = asTag(root.children[0]);
  assert.equal(paragraph.name, "p");
  assert.equal(paragraph.children.length, 1);
  const sentence = asTag(paragraph.children[0]);
  assert.deepEqual(sentence.children, [{ kind: "text", value: "hi" }]);
});

test("parseSsml keeps surrounding whitespace of non-blank text", () => {
  const root = parseSsml("<speak>  spaced out \n</speak>");
  assert.deepEqual(root.children, [{ kind: "text", value: "  spaced out \n" }]);
});

test("parseSsml decodes entities in text once", () => {
  const root = parseSsml("<speak>a &amp; b &lt; c &gt; d &amp;lt;</speak>");
  assert.deepEqual(root.children, [{ kind: "text", value: "a & b < c > d &lt;" }]);
});

test("parseSsml keeps attribute values undecoded and in order", () => {
  const root = parseSsml('<speak a="1" b="x &amp; y">x</speak>');
  assert.deepEqual([...root.attributes], [
    ["a", "1"],
    ["b", "x &amp; y"],
  ]);
});

test("parseSsml trims tag interiors", () => {
  const root = parseSsml('  <speak ><say-as  interpret-as="digits" >42</ say-as ></ speak >\n');
  const sayAs = asTag(root.children[0]);
  assert.equal(sayAs.name, "say-as");
  assert.equal(sayAs.attributes.get("interpret-as"), "digits");
});

test("parseSsml treats self-closing and empty open/close pairs alike", () => {
  const selfClosing = parseSsml("<speak><break/></speak>");
  const paired = parseSsml("<speak><break></break></speak>");
  assert.ok(nodesEqual(selfClosing, paired));
  assert.equal(asTag(selfClosing.children[0]).children.length, 0);
});

test("parseSsml reads attributes of self-closing tags without the slash", () => {
  const root = parseSsml('<speak><mark name="a"/><break time="2s" /></speak>');
  assert.equal(asTag(root.children[0]).attributes.get("name"), "a");
  assert.equal(asTag(root.children[1]).attributes.get("time"), "2s");
});

test("parseSsml rejects each structural violation with its own code", () => {
  expectCode(() => parseSsml("<speak>hi"), "UNCLOSED_TAGS");
  expectCode(() => parseSsml("<speak><p></p>"), "UNCLOSED_TAGS");
  expectCode(() => parseSsml("<speak></say>"), "MISMATCHED_CLOSING_TAG");
  expectCode(() => parseSsml("<speak><p>text</speak>"), "MISMATCHED_CLOSING_TAG");
  expectCode(() => parseSsml("<speak></speak><speak></speak>"), "MULTIPLE_TOP_LEVEL_ROOTS");
  expectCode(() => parseSsml("<speak/><speak/>"), "SELF_CLOSING_OUTSIDE_ROOT");
  expectCode(() => parseSsml("<break/>"), "SELF_CLOSING_OUTSIDE_ROOT");
  expectCode(() => parseSsml("hello"), "TEXT_OUTSIDE_ROOT");
  expectCode(() => parseSsml("<speak></speak>tail"), "TEXT_OUTSIDE_ROOT");
  expectCode(() => parseSsml("<speak"), "UNTERMINATED_TAG");
  expectCode(() => parseSsml("<speak>a < b</speak"), "UNTERMINATED_TAG");
  expectCode(() => parseSsml("</speak>"), "UNMATCHED_CLOSING_TAG");
  expectCode(() => parseSsml(""), "MISSING_ROOT");
  expectCode(() => parseSsml("  \n\t"), "MISSING_ROOT");
  expectCode(() => parseSsml("<say>x</say>"), "WRONG_ROOT_NAME");
  expectCode(() => parseSsml("<speak><></speak>"), "EMPTY_TAG_NAME");
});

test("parseSsml rejects malformed attributes", () => {
  expectCode(() => parseSsml("<speak><break time='1s'/></speak>"), "MALFORMED_ATTRIBUTE_SYNTAX");
  expectCode(() => parseSsml("<speak name=foo></speak>"), "MALFORMED_ATTRIBUTE_SYNTAX");
});

test("parseSsml checks attributes before the second top-level tag", () => {
  expectCode(() => parseSsml("<speak></speak><p x='1'>"), "MALFORMED_ATTRIBUTE_SYNTAX");
});

test("parseSsml checks for an open parent before self-closing attributes", () => {
  expectCode(() => parseSsml("<break time='1s'/>"), "SELF_CLOSING_OUTSIDE_ROOT");
});

test("parseSsml reports the line and column of the failure", () => {
  assert.throws(
    () => parseSsml("<speak>\n  <p>\n</speak>"),
    (error: unknown) => {
      assert.ok(error instanceof SsmlError);
      assert.equal(error.code, "MISMATCHED_CLOSING_TAG");
      assert.deepEqual(error.span, {
        start: { line: 3, column: 1 },
        end: { line: 3, column: 8 },
      });
      return true;
    }
  );
  assert.throws(
    () => parseSsml("<speak>\nab <break"),
    (error: unknown) => {
      assert.ok(error instanceof SsmlError);
      assert.equal(error.code, "UNTERMINATED_TAG");
      assert.deepEqual(error.span?.start, { line: 2, column: 4 });
      return true;
    }
  );
});

test("parseSsml points unclosed tags at the innermost open tag", () => {
  assert.throws(
    () => parseSsml("<speak><p>x"),
    (error: unknown) => {
      assert.ok(error instanceof SsmlError);
      assert.equal(error.code, "UNCLOSED_TAGS");
      assert.equal(error.message, "Unclosed tags remain: <speak>, <p>.");
      assert.deepEqual(error.span, {
        start: { line: 1, column: 8 },
        end: { line: 1, column: 10 },
      });
      return true;
    }
  );
});

test("parseSsml locates the root of a wrongly named document", () => {
  assert.throws(
    () => parseSsml("<say>x</say>"),
    (error: unknown) => {
      assert.ok(error instanceof SsmlError);
      assert.equal(error.code, "WRONG_ROOT_NAME");
      assert.deepEqual(error.span, {
        start: { line: 1, column: 1 },
        end: { line: 1, column: 5 },
      });
      return true;
    }
  );
});

test("parseSsml handles a large multi-line document in linear time", () => {
  const count = 50_000;
  const markup = `<speak>\n${'<break time="1s"/>\n'.repeat(count)}</speak>`;
  const startedAt = performance.now();
  const root = parseSsml(markup);
  const elapsedMs = performance.now() - startedAt;
  assert.equal(root.children.length, count);
  assert.ok(elapsedMs < 5_000, `parsing ${count} tags took ${Math.round(elapsedMs)}ms`);
});

test("parseSsml reports the position of an error deep in a large document", () => {
  const markup = `<speak>\n${"<p>x</p>\n".repeat(20_000)}<p></speak>`;
  assert.throws(
    () => parseSsml(markup),
    (error: unknown) => {
      assert.ok(error instanceof SsmlError);
      assert.equal(error.code, "MISMATCHED_CLOSING_TAG");
      assert.deepEqual(error.span?.start, { line: 20_002, column: 4 });
      return true;
    }
  );
});
