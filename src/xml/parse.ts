import { SaxesParser } from "saxes";

import { XmlError } from "../core/errors.js";
import type {
  XmlDeclaration,
  XmlDocument,
  XmlElementNode,
  XmlMiscNode,
  XmlNode,
} from "../core/types.js";
import { detectByteOrderMark, isEncodingOf, resolveCharset, type ByteOrder } from "./charset.js";

const DEFAULT_ENCODING = "utf-8";
const ENCODING_PATTERN = /^<\?.*encoding=['"](.*?)['"].*\?>/i;
const DECLARATION_PATTERN = /^<\?.*\?>/;
const BLANK_PATTERN = /^[ \t\r\n]*$/;
const LEADING_SPACE_PATTERN = /^[ \t\r\n]+/;
const BOM = "﻿";
const DUPLICATE_ATTRIBUTE_PATTERN = /duplicate attribute/i;

export interface DetectedEncoding {
  encoding: string;
  hasDeclaration: boolean;
}

const firstLineOf = (text: string): string => {
  const end = text.search(/[\r\n]/);
  return end === -1 ? text : text.slice(0, end);
};

const readFirstLine = (raw: string | Uint8Array, byteOrder: ByteOrder | undefined): string => {
  if (typeof raw === "string") {
    return firstLineOf(raw);
  }
  if (byteOrder !== undefined) {
    return firstLineOf(new TextDecoder(byteOrder).decode(raw));
  }
  const end = raw.findIndex((byte) => byte === 0x0a || byte === 0x0d);
  return new TextDecoder("utf-8").decode(end === -1 ? raw : raw.subarray(0, end));
};

/**
 * Reads the encoding label from an XML declaration on the first line.
 * A UTF-16 byte-order mark overrides a label that names another charset.
 */
export const detectEncoding = (
  raw: string | Uint8Array,
  declaredEncoding?: string
): DetectedEncoding => {
  const byteOrder = typeof raw === "string" ? undefined : detectByteOrderMark(raw);
  let prefix = readFirstLine(raw, byteOrder);
  if (prefix.startsWith(BOM)) {
    prefix = prefix.slice(BOM.length);
  }
  const match = ENCODING_PATTERN.exec(prefix);
  let encoding = match ? match[1] : (declaredEncoding ?? DEFAULT_ENCODING);
  if (byteOrder !== undefined && !isEncodingOf(encoding, byteOrder)) {
    encoding = byteOrder;
  }
  return {
    encoding: encoding.toLowerCase(),
    hasDeclaration: DECLARATION_PATTERN.test(prefix),
  };
};

const isBlank = (value: string): boolean => BLANK_PATTERN.test(value);

const readAttributes = (attributes: Record<string, string | { value: string }>): [string, string][] =>
  Object.entries(attributes).map(([name, value]) => [
    name,
    typeof value === "string" ? value : value.value,
  ]);

const resolvePreserve = (attributes: [string, string][], inherited: boolean): boolean => {
  const space = attributes.find(([name]) => name === "xml:space");
  if (!space) {
    return inherited;
  }
  return space[1] === "preserve";
};

const hasTextEdge = (element: XmlElementNode): boolean => {
  const first = element.children[0];
  const last = element.children[element.children.length - 1];
  return first?.kind === "text" || last?.kind === "text";
};

export const parseXml = (raw: string | Uint8Array, declaredEncoding?: string): XmlDocument => {
  const detected = detectEncoding(raw, declaredEncoding);
  const charset = resolveCharset(detected.encoding);
  const source = typeof raw === "string" ? raw : charset.decode(raw);

  const parser = new SaxesParser({ xmlns: false, position: true });
  const stack: XmlElementNode[] = [];
  const preserveStack: boolean[] = [];
  const prolog: XmlMiscNode[] = [];
  const epilog: XmlMiscNode[] = [];
  const declaration: XmlDeclaration = { version: "1.0", standalone: null };
  let root: XmlElementNode | null = null;
  let doctype: string | null = null;
  let pendingBlank: string | null = null;
  let parseError: XmlError | null = null;

  const append = (node: XmlNode): void => {
    pendingBlank = null;
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
      return;
    }
    if (node.kind === "comment" || node.kind === "pi") {
      (root ? epilog : prolog).push(node);
    }
  };

  parser.on("error", (error) => {
    // Repeated attributes keep the last value.
    if (parseError || DUPLICATE_ATTRIBUTE_PATTERN.test(error.message)) {
      return;
    }
    parseError = new XmlError("XML_PARSE_ERROR", `Invalid XML: ${error.message}`, {
      offset: parser.position,
      line: parser.line,
      column: parser.column,
    });
  });

  parser.on("xmldecl", (decl) => {
    declaration.version = decl.version ?? declaration.version;
    declaration.standalone = decl.standalone ?? null;
  });

  parser.on("doctype", (value) => {
    doctype = value.trim();
  });

  parser.on("opentag", (tag) => {
    const attributes = readAttributes(tag.attributes);
    const node: XmlElementNode = {
      kind: "element",
      name: tag.name,
      attributes,
      children: [],
    };
    append(node);
    preserveStack.push(resolvePreserve(attributes, preserveStack[preserveStack.length - 1] ?? false));
    stack.push(node);
  });

  parser.on("text", (value) => {
    const parent = stack[stack.length - 1];
    if (!parent) {
      return;
    }
    if (!isBlank(value) || preserveStack[preserveStack.length - 1] || hasTextEdge(parent)) {
      append({ kind: "text", value });
      return;
    }
    // Kept only if it turns out to be the whole content of the element.
    pendingBlank = parent.children.length === 0 ? value : null;
  });

  parser.on("cdata", (value) => {
    append({ kind: "cdata", value });
  });

  parser.on("comment", (value) => {
    append({ kind: "comment", value });
  });

  parser.on("processinginstruction", (pi) => {
    append({
      kind: "pi",
      target: pi.target ?? "",
      body: pi.body.replace(LEADING_SPACE_PATTERN, ""),
    });
  });

  parser.on("closetag", () => {
    const node = stack.pop();
    preserveStack.pop();
    if (!node) {
      return;
    }
    if (pendingBlank !== null && node.children.length === 0) {
      node.children.push({ kind: "text", value: pendingBlank });
    }
    pendingBlank = null;
    if (stack.length === 0) {
      root = node;
    }
  });

  parser.write(source).close();

  if (parseError) {
    throw parseError;
  }
  if (!root) {
    throw new XmlError("XML_EMPTY", "Invalid XML: document has no root element.");
  }

  return {
    encoding: detected.encoding,
    hasDeclaration: detected.hasDeclaration,
    declaration,
    doctype,
    prolog,
    root,
    epilog,
  };
};
