import fs from "node:fs";
import path from "node:path";

import { isDeclaredLanguage, languageFromPath } from "../../core/classify.js";
import type { DeclaredLanguage } from "../../core/types.js";
import { resolveCharset } from "../../xml/charset.js";
import { makeCliError } from "./args.js";

export interface LoadedSource {
  path: string;
  bytes: Uint8Array;
  language: DeclaredLanguage;
}

export const resolveLanguage = (filePath: string, override?: string): DeclaredLanguage => {
  if (override === undefined) {
    return languageFromPath(filePath);
  }
  if (!isDeclaredLanguage(override)) {
    throw makeCliError("CLI_ARG_FORMAT", `--language must be xml, json or plain, got: ${override}`);
  }
  return override;
};

export const loadSource = (filePath: string, language?: string): LoadedSource => {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw makeCliError("CLI_FILE_NOT_FOUND", `File does not exist: ${resolved}`);
  }
  if (!fs.statSync(resolved).isFile()) {
    throw makeCliError("CLI_FILE_NOT_FOUND", `Path is not a file: ${resolved}`);
  }
  return {
    path: resolved,
    bytes: fs.readFileSync(resolved),
    language: resolveLanguage(resolved, language),
  };
};

/**
 * Writes formatted text back in the document's encoding, with a final newline.
 */
export const writeFormatted = (filePath: string, text: string, encoding: string): void => {
  const bytes = resolveCharset(encoding).encode(`${text}\n`);
  fs.writeFileSync(filePath, bytes);
};
