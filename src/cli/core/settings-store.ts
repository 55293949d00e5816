import fs from "node:fs";
import path from "node:path";

import { readIndentOptions } from "../../core/config.js";
import type { IndentOptions } from "../../core/types.js";
import { stripComments } from "../../json/strip-comments.js";
import { makeCliError } from "./args.js";

export const DEFAULT_SETTINGS_FILE = "./markup-indent.settings.json";

export const loadSettings = (settingsPath: string): IndentOptions => {
  const resolved = path.resolve(settingsPath);
  if (!fs.existsSync(resolved)) {
    throw makeCliError("CLI_SETTINGS_NOT_FOUND", `Settings file does not exist: ${resolved}`);
  }
  const raw = fs.readFileSync(resolved, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripComments(raw));
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown error";
    throw makeCliError("CLI_SETTINGS_INVALID", `Settings file is not valid JSON: ${resolved} (${message})`);
  }
  return readIndentOptions(parsed, resolved);
};

/**
 * An explicit path must exist; the default file is read only when present.
 */
export const resolveSettings = (settingsPath?: string): IndentOptions => {
  if (settingsPath !== undefined) {
    return loadSettings(settingsPath);
  }
  if (fs.existsSync(path.resolve(DEFAULT_SETTINGS_FILE))) {
    return loadSettings(DEFAULT_SETTINGS_FILE);
  }
  return {};
};
