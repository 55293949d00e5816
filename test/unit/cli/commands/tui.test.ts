import assert from "node:assert/strict";
import { afterEach, test, vi } from "vitest";

import { parseTuiArgs, runTuiCommand } from "../../../../src/cli/commands/tui.js";

afterEach(() => {
  vi.restoreAllMocks();
});

const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, { code });
};

test("parseTuiArgs reads the file and optional flags", () => {
  assert.deepEqual(parseTuiArgs(["doc.xml"]), { file: "doc.xml", language: undefined, settingsFile: undefined });
  assert.deepEqual(parseTuiArgs(["doc.txt", "--language", "json", "--settings", "s.json"]), {
    file: "doc.txt",
    language: "json",
    settingsFile: "s.json",
  });
  expectCode(() => parseTuiArgs([]), "CLI_FILE_REQUIRED");
  expectCode(() => parseTuiArgs(["a", "b"]), "CLI_ARG_FORMAT");
  expectCode(() => parseTuiArgs(["a", "--write", "true"]), "CLI_ARG_FORMAT");
});

test("runTuiCommand fails before rendering on bad arguments", async () => {
  const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  assert.equal(await runTuiCommand([]), 1);
  assert.deepEqual(stderr.mock.calls[0]?.[0], "Missing file argument. Use tui <file>.\n");
});
