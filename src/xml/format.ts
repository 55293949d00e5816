import { XmlError } from "../core/errors.js";
import type { IndentConfig, XmlDocument } from "../core/types.js";
import { parseXml } from "./parse.js";
import { remapIndent } from "./remap-indent.js";
import { serializeXml } from "./serialize.js";

export const renderXml = (doc: XmlDocument, config: IndentConfig): string => {
  try {
    return remapIndent(serializeXml(doc), config.xmlIndent);
  } catch (error) {
    // Stack exhaustion on deeply nested input.
    if (error instanceof RangeError) {
      throw new XmlError("XML_PARSE_ERROR", "Invalid XML: document nests too deeply.");
    }
    throw error;
  }
};

export const formatXml = (
  raw: string | Uint8Array,
  config: IndentConfig,
  declaredEncoding?: string
): string => renderXml(parseXml(raw, declaredEncoding), config);
