import assert from "node:assert/strict";
import { test } from "vitest";

import { resolveIndentConfig } from "../../../src/core/config.js";
import { XmlError } from "../../../src/core/errors.js";
import { formatXml, renderXml } from "../../../src/xml/format.js";
import { parseXml } from "../../../src/xml/parse.js";

const TABS = resolveIndentConfig({ xml_indent: "\t" });

test("formatXml uses four spaces by default", () => {
  assert.equal(
    formatXml("<r><a><b/></a></r>", resolveIndentConfig()),
    "<r>\n    <a>\n        <b/>\n    </a>\n</r>"
  );
});

test("formatXml keeps CDATA payload spacing", () => {
  assert.equal(
    formatXml("<r><![CDATA[  weird   spacing\n  here]]></r>", TABS),
    "<r><![CDATA[  weird   spacing\n  here]]></r>"
  );
  assert.equal(
    formatXml("<doc><r><![CDATA[  weird   spacing\n  here]]></r></doc>", TABS),
    "<doc>\n\t<r><![CDATA[  weird   spacing\n  here]]></r>\n</doc>"
  );
});

test("formatXml leaves authored leading spaces of multiline text alone", () => {
  assert.equal(formatXml("<r><b>line1\n  line2</b></r>", TABS), "<r>\n\t<b>line1\n  line2</b>\n</r>");
});

test("formatXml is idempotent", () => {
  const source = `<?xml version="1.0"?>\n<r a="1">\n<b>line1\n  line2</b>\n<!-- c --><c><![CDATA[ x\n y ]]></c><d><e/></d></r>`;
  const once = formatXml(source, TABS);
  assert.equal(formatXml(once, TABS), once);
  const spaced = formatXml(source, resolveIndentConfig());
  assert.equal(formatXml(spaced, resolveIndentConfig()), spaced);
});

test("formatXml decodes Latin-1 bytes and keeps the declaration", () => {
  const bytes = Buffer.concat([
    Buffer.from(`<?xml version="1.0" encoding="ISO-8859-1"?>\n<r><a>caf`, "latin1"),
    Buffer.from([0xe9]),
    Buffer.from("</a></r>", "latin1"),
  ]);
  assert.equal(
    formatXml(bytes, resolveIndentConfig()),
    "<?xml version='1.0' encoding='iso-8859-1'?>\n<r>\n    <a>café</a>\n</r>"
  );
});

test("formatXml falls back to the caller's encoding", () => {
  assert.equal(formatXml(Buffer.from([0x3c, 0x72, 0x3e, 0xe9, 0x3c, 0x2f, 0x72, 0x3e]), TABS, "latin1"), "<r>é</r>");
});

test("renderXml applies the configured unit to a parsed document", () => {
  assert.equal(renderXml(parseXml("<r><a/></r>"), resolveIndentConfig({ xml_indent: 1 })), "<r>\n <a/>\n</r>");
});

test("formatXml raises XmlError and produces no text on malformed input", () => {
  assert.throws(() => formatXml("<a><b></a>", TABS), XmlError);
});

test("formatXml reports runaway nesting as XmlError", () => {
  const depth = 100000;
  const source = `<r>x${"<a>".repeat(depth)}${"</a>".repeat(depth)}</r>`;
  assert.throws(
    () => formatXml(source, TABS),
    (error: unknown) => {
      assert.ok(error instanceof XmlError);
      assert.equal(error.code, "XML_PARSE_ERROR");
      assert.equal(error.message, "Invalid XML: document nests too deeply.");
      return true;
    }
  );
});
