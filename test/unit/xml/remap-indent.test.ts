import assert from "node:assert/strict";
import { test } from "vitest";

import { advanceLineState, remapIndent } from "../../../src/xml/remap-indent.js";

const remapLines = (lines: string[], unit: string): string[] => remapIndent(lines.join("\n"), unit).split("\n");

test("remapIndent turns each two-space level into one unit", () => {
  assert.equal(
    remapIndent("<r>\n  <a>\n    <b/>\n  </a>\n</r>", "\t"),
    "<r>\n\t<a>\n\t\t<b/>\n\t</a>\n</r>"
  );
  assert.equal(remapIndent("<r>\n  <a/>\n</r>", "    "), "<r>\n    <a/>\n</r>");
});

test("remapIndent returns the text as is for a two-space unit", () => {
  const text = "<r>\n  <a/>\n</r>";
  assert.equal(remapIndent(text, "  "), text);
});

test("remapIndent leaves text continuation lines alone", () => {
  assert.equal(
    remapIndent("<r>\n  <b>line1\n  line2</b>\n</r>", "\t"),
    "<r>\n\t<b>line1\n  line2</b>\n</r>"
  );
});

test("remapIndent copies CDATA interiors verbatim", () => {
  assert.deepEqual(remapLines(["  <a><![CDATA[x", "    <y>", "  ]]></a>", "  <b/>"], "\t"), [
    "\t<a><![CDATA[x",
    "    <y>",
    "  ]]></a>",
    "\t<b/>",
  ]);
});

test("remapIndent does not arm on a CDATA section closed on the same line", () => {
  assert.deepEqual(remapLines(["  <a><![CDATA[x]]></a>", "  <b/>"], "\t"), ["\t<a><![CDATA[x]]></a>", "\t<b/>"]);
});

test("remapIndent copies comment interiors verbatim", () => {
  assert.deepEqual(remapLines(["  <!-- note", "    <old/>", "  -->", "  <a/>"], "\t"), [
    "\t<!-- note",
    "    <old/>",
    "  -->",
    "\t<a/>",
  ]);
});

test("remapIndent keeps an odd leftover space", () => {
  assert.equal(remapIndent("   <a/>", "\t"), "\t <a/>");
  assert.equal(remapIndent(" <a/>", "\t"), " <a/>");
});

test("advanceLineState follows openers and closers in order", () => {
  assert.equal(advanceLineState("<a><![CDATA[x", "markup"), "cdata");
  assert.equal(advanceLineState("x]]></a><!-- c", "cdata"), "comment");
  assert.equal(advanceLineState("<!-- <![CDATA[ -->", "markup"), "markup");
  assert.equal(advanceLineState("still inside", "comment"), "comment");
  assert.equal(advanceLineState("<a/>", "markup"), "markup");
});
