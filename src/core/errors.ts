import type { SourcePosition } from "./types.js";

export class IndentError extends Error {
  readonly code: string;
  readonly position?: SourcePosition;

  constructor(code: string, message: string, position?: SourcePosition) {
    super(message);
    this.name = "IndentError";
    this.code = code;
    this.position = position;
  }
}

export class JsonError extends IndentError {
  declare readonly position: SourcePosition;

  constructor(message: string, position: SourcePosition) {
    super("JSON_PARSE_ERROR", message, position);
    this.name = "JsonError";
  }
}

export class XmlError extends IndentError {
  constructor(code: string, message: string, position?: SourcePosition) {
    super(code, message, position);
    this.name = "XmlError";
  }
}
