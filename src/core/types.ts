export type DeclaredLanguage = "xml" | "json" | "plain";

export type TextKind = "xml" | "json" | "unsupported";

export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

/**
 * Caller-facing options. Keys keep the names used by editor settings files.
 * A number is a width in spaces; a string is used literally as the unit.
 */
export interface IndentOptions {
  json_indent?: number | string;
  json_sortkeys?: boolean;
  xml_indent?: number | string;
}

export interface IndentConfig {
  readonly jsonIndent: string;
  readonly jsonSortKeys: boolean;
  readonly xmlIndent: string;
}

export type JsonValue =
  | { kind: "object"; entries: Map<string, JsonValue> }
  | { kind: "array"; items: JsonValue[] }
  | { kind: "string"; value: string }
  | { kind: "number"; raw: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" };

export interface XmlTextNode {
  kind: "text";
  value: string;
}

export interface XmlCdataNode {
  kind: "cdata";
  value: string;
}

export interface XmlCommentNode {
  kind: "comment";
  value: string;
}

export interface XmlProcessingInstructionNode {
  kind: "pi";
  target: string;
  body: string;
}

export interface XmlElementNode {
  kind: "element";
  name: string;
  attributes: [string, string][];
  children: XmlNode[];
}

export type XmlNode =
  | XmlElementNode
  | XmlTextNode
  | XmlCdataNode
  | XmlCommentNode
  | XmlProcessingInstructionNode;

export type XmlMiscNode = XmlCommentNode | XmlProcessingInstructionNode;

export interface XmlDeclaration {
  version: string;
  standalone: string | null;
}

export interface XmlDocument {
  encoding: string;
  hasDeclaration: boolean;
  declaration: XmlDeclaration;
  doctype: string | null;
  prolog: XmlMiscNode[];
  root: XmlElementNode;
  epilog: XmlMiscNode[];
}
