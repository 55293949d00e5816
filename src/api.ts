import { classify } from "./core/classify.js";
import { resolveIndentConfig } from "./core/config.js";
import { JsonError, XmlError } from "./core/errors.js";
import type { DeclaredLanguage, IndentOptions } from "./core/types.js";
import { formatJson } from "./json/format.js";
import { detectByteOrderMark } from "./xml/charset.js";
import { parseXml } from "./xml/parse.js";
import { renderXml } from "./xml/format.js";

export interface FormatRequest {
  source: string | Uint8Array;
  language?: DeclaredLanguage;
  options?: IndentOptions;
  /** Fallback when an XML document does not name its encoding. */
  encoding?: string;
}

export type FormatOutcome =
  | { status: "formatted"; kind: "json" | "xml"; text: string; encoding: string }
  | { status: "unsupported"; text: string }
  | { status: "failed"; kind: "json"; error: JsonError }
  | { status: "failed"; kind: "xml"; error: XmlError };

const isAsciiWhitespace = (byte: number): boolean =>
  byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;

const trimBytes = (bytes: Uint8Array): Uint8Array => {
  let start = 0;
  let end = bytes.length;
  while (start < end && isAsciiWhitespace(bytes[start])) {
    start += 1;
  }
  while (end > start && isAsciiWhitespace(bytes[end - 1])) {
    end -= 1;
  }
  return bytes.subarray(start, end);
};

const asText = (source: string | Uint8Array): string =>
  typeof source === "string"
    ? source
    : new TextDecoder(detectByteOrderMark(source) ?? "utf-8").decode(source);

// UTF-16 whitespace spans two bytes, so only the parser may trim it.
const trimSource = (source: string | Uint8Array): string | Uint8Array => {
  if (typeof source === "string") {
    return source.trim();
  }
  return detectByteOrderMark(source) === undefined ? trimBytes(source) : source;
};

/**
 * Classifies the source and runs the matching formatter. Surrounding
 * whitespace is trimmed first; failures come back as values, never partial text.
 */
export const formatDocument = (request: FormatRequest): FormatOutcome => {
  const config = resolveIndentConfig(request.options);
  const text = asText(request.source);
  const kind = classify(text, request.language ?? "plain");

  switch (kind) {
    case "unsupported":
      return { status: "unsupported", text };
    case "json":
      try {
        return { status: "formatted", kind, text: formatJson(text.trim(), config), encoding: "utf-8" };
      } catch (error) {
        if (error instanceof JsonError) {
          return { status: "failed", kind, error };
        }
        throw error;
      }
    case "xml":
      try {
        const doc = parseXml(trimSource(request.source), request.encoding);
        return { status: "formatted", kind, text: renderXml(doc, config), encoding: doc.encoding };
      } catch (error) {
        if (error instanceof XmlError) {
          return { status: "failed", kind, error };
        }
        throw error;
      }
  }
};
