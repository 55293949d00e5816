export const MARKUP_INDENT_VERSION = "0.1.0";

export * from "./core/errors.js";
export type * from "./core/types.js";
export * from "./core/config.js";
export * from "./core/classify.js";
export * from "./json/index.js";
export * from "./xml/index.js";
export * from "./api.js";
