import jsonc, { type Node, type ParseError } from "jsonc-parser";

import { JsonError } from "../core/errors.js";
import type { JsonValue, SourcePosition } from "../core/types.js";

// The package ships a UMD build, so Node's ESM loader exposes only its default export.
const { parseTree, printParseErrorCode } = jsonc;

const MESSAGES: Record<string, string> = {
  InvalidSymbol: "Invalid symbol",
  InvalidNumberFormat: "Invalid number",
  PropertyNameExpected: "Expecting property name enclosed in double quotes",
  ValueExpected: "Expecting value",
  ColonExpected: "Expecting ':' delimiter",
  CommaExpected: "Expecting ',' delimiter",
  CloseBraceExpected: "Expecting '}'",
  CloseBracketExpected: "Expecting ']'",
  EndOfFileExpected: "Extra data",
  InvalidCommentToken: "Unexpected comment",
  UnexpectedEndOfComment: "Unterminated comment starting at",
  UnexpectedEndOfString: "Unterminated string starting at",
  UnexpectedEndOfNumber: "Unterminated number",
  InvalidUnicode: "Invalid \\uXXXX escape",
  InvalidEscapeCharacter: "Invalid \\escape",
  InvalidCharacter: "Invalid control character at",
};

export const positionAt = (text: string, offset: number): SourcePosition => {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < text.length; i += 1) {
    if (text[i] === "\n") {
      line += 1;
      lineStart = i + 1;
    }
  }
  return { offset, line, column: offset - lineStart + 1 };
};

export const jsonErrorAt = (text: string, message: string, offset: number): JsonError => {
  const position = positionAt(text, offset);
  return new JsonError(
    `${message}: line ${position.line} column ${position.column} (char ${offset})`,
    position
  );
};

const toJsonError = (text: string, error: ParseError): JsonError => {
  const code = printParseErrorCode(error.error);
  return jsonErrorAt(text, MESSAGES[code] ?? code, error.offset);
};

const childAt = (text: string, node: Node, index: number): Node => {
  const child = node.children?.[index];
  if (!child) {
    throw jsonErrorAt(text, "Expecting value", node.offset + node.length);
  }
  return child;
};

const toJsonValue = (text: string, node: Node): JsonValue => {
  switch (node.type) {
    case "null":
      return { kind: "null" };
    case "boolean":
      return { kind: "boolean", value: node.value === true };
    case "number":
      return { kind: "number", raw: text.slice(node.offset, node.offset + node.length) };
    case "string":
      return { kind: "string", value: String(node.value) };
    case "array":
      return { kind: "array", items: (node.children ?? []).map((item) => toJsonValue(text, item)) };
    case "object": {
      const entries = new Map<string, JsonValue>();
      for (const property of node.children ?? []) {
        // Map.set keeps the first position of a repeated key and the last value.
        const key = String(childAt(text, property, 0).value);
        entries.set(key, toJsonValue(text, childAt(text, property, 1)));
      }
      return { kind: "object", entries };
    }
    case "property":
      return toJsonValue(text, childAt(text, node, 1));
  }
};

/**
 * Parses strict JSON into an order-preserving tree. Numbers keep their source lexeme.
 */
export const parseJson = (text: string): JsonValue => {
  const errors: ParseError[] = [];
  const tree = parseTree(text, errors, {
    allowTrailingComma: false,
    disallowComments: true,
    allowEmptyContent: false,
  });
  const [first] = errors;
  if (first) {
    throw toJsonError(text, first);
  }
  if (!tree) {
    throw jsonErrorAt(text, "Expecting value", 0);
  }
  return toJsonValue(text, tree);
};
