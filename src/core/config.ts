import { IndentError } from "./errors.js";
import type { IndentConfig, IndentOptions } from "./types.js";

export const DEFAULT_JSON_INDENT = 4;
export const DEFAULT_XML_INDENT = 4;
export const XML_BASELINE_INDENT = "  ";

const toIndentUnit = (value: number | string, optionName: string): string => {
  if (typeof value === "string") {
    return value;
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new IndentError(
      "CONFIG_INVALID",
      `${optionName} must be a non-negative integer or a string, got ${value}.`
    );
  }
  return " ".repeat(value);
};

const isIndentValue = (value: unknown): value is number | string =>
  typeof value === "number" || typeof value === "string";

/**
 * Validates untrusted option objects, e.g. parsed settings files.
 */
export const readIndentOptions = (value: unknown, source = "options"): IndentOptions => {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new IndentError("CONFIG_INVALID", `${source} must be an object.`);
  }
  const candidate = value as Record<string, unknown>;
  const options: IndentOptions = {};
  if (candidate.json_indent !== undefined) {
    if (!isIndentValue(candidate.json_indent)) {
      throw new IndentError("CONFIG_INVALID", `${source}: json_indent must be a number or a string.`);
    }
    options.json_indent = candidate.json_indent;
  }
  if (candidate.json_sortkeys !== undefined) {
    if (typeof candidate.json_sortkeys !== "boolean") {
      throw new IndentError("CONFIG_INVALID", `${source}: json_sortkeys must be a boolean.`);
    }
    options.json_sortkeys = candidate.json_sortkeys;
  }
  if (candidate.xml_indent !== undefined) {
    if (!isIndentValue(candidate.xml_indent)) {
      throw new IndentError("CONFIG_INVALID", `${source}: xml_indent must be a number or a string.`);
    }
    options.xml_indent = candidate.xml_indent;
  }
  return options;
};

export const resolveIndentConfig = (options: IndentOptions = {}): IndentConfig =>
  Object.freeze({
    jsonIndent: toIndentUnit(options.json_indent ?? DEFAULT_JSON_INDENT, "json_indent"),
    jsonSortKeys: options.json_sortkeys ?? false,
    xmlIndent: toIndentUnit(options.xml_indent ?? DEFAULT_XML_INDENT, "xml_indent"),
  });

export const DEFAULT_INDENT_CONFIG: IndentConfig = resolveIndentConfig();
