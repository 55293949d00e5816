import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { test } from "vitest";

import { loadSource, resolveLanguage, writeFormatted } from "../../../../src/cli/core/source-loader.js";

const makeDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), "markup-indent-source-"));

const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, { code });
};

test("resolveLanguage uses the extension unless overridden", () => {
  assert.equal(resolveLanguage("/tmp/a.json"), "json");
  assert.equal(resolveLanguage("/tmp/a.json", "xml"), "xml");
  expectCode(() => resolveLanguage("/tmp/a.json", "yaml"), "CLI_ARG_FORMAT");
});

test("loadSource reads bytes and the language", () => {
  const file = path.join(makeDir(), "doc.xml");
  fs.writeFileSync(file, "<r/>", "utf8");
  const source = loadSource(file);
  assert.equal(source.path, file);
  assert.equal(source.language, "xml");
  assert.equal(Buffer.from(source.bytes).toString("utf8"), "<r/>");
});

test("loadSource rejects missing files and directories", () => {
  const dir = makeDir();
  expectCode(() => loadSource(path.join(dir, "nope.xml")), "CLI_FILE_NOT_FOUND");
  expectCode(() => loadSource(dir), "CLI_FILE_NOT_FOUND");
});

test("writeFormatted encodes with the document charset and ends with a newline", () => {
  const dir = makeDir();
  const utf8File = path.join(dir, "u.xml");
  writeFormatted(utf8File, "<r>é</r>", "utf-8");
  assert.deepEqual([...fs.readFileSync(utf8File)], [...Buffer.from("<r>é</r>\n", "utf8")]);

  const latinFile = path.join(dir, "l.xml");
  writeFormatted(latinFile, "<r>é</r>", "iso-8859-1");
  assert.deepEqual([...fs.readFileSync(latinFile)], [0x3c, 0x72, 0x3e, 0xe9, 0x3c, 0x2f, 0x72, 0x3e, 0x0a]);
});
