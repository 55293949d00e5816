import type { IndentConfig } from "../core/types.js";
import { jsonErrorAt, parseJson } from "./parse.js";
import { serializeJson } from "./serialize.js";
import { stripComments } from "./strip-comments.js";

export const formatJson = (raw: string, config: IndentConfig): string => {
  try {
    const tree = parseJson(stripComments(raw));
    return serializeJson(tree, { indent: config.jsonIndent, sortKeys: config.jsonSortKeys });
  } catch (error) {
    // Stack exhaustion on deeply nested input.
    if (error instanceof RangeError) {
      throw jsonErrorAt(raw, "Document nests too deeply", 0);
    }
    throw error;
  }
};
