#!/usr/bin/env node

import path from "node:path";
import { fileURLToPath } from "node:url";

import { runFormatCommand } from "./commands/format.js";
import { runTuiCommand } from "./commands/tui.js";

const usage = [
  "markup-indent",
  "  format <file> [--language xml|json|plain] [--json-indent <n|tab|unit>]",
  "                [--json-sortkeys true|false] [--xml-indent <n|tab|unit>]",
  "                [--encoding <label>] [--settings <path>] [--write true|false]",
  "  tui <file> [--language xml|json|plain] [--settings <path>]",
].join("\n");

export const runIndentCli = async (argv: string[]): Promise<number> => {
  const [mode, ...rest] = argv;
  if (!mode || mode === "--help" || mode === "-h") {
    process.stdout.write(`${usage}\n`);
    return 0;
  }
  if (mode === "format") {
    return runFormatCommand(rest);
  }
  if (mode === "tui") {
    return runTuiCommand(rest);
  }
  process.stderr.write(`Unknown mode: ${mode}\n${usage}\n`);
  return 1;
};

const currentPath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

/* v8 ignore next 11 */
if (entryPath && currentPath === entryPath) {
  runIndentCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : "Unknown CLI crash.";
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    });
}
