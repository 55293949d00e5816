export { stripComments, type StripCommentsOptions } from "./strip-comments.js";
export { jsonErrorAt, parseJson, positionAt } from "./parse.js";
export { serializeJson, type SerializeJsonOptions } from "./serialize.js";
export { formatJson } from "./format.js";
