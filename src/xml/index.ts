export {
  detectByteOrderMark,
  isEncodingOf,
  resolveCharset,
  type ByteOrder,
  type Charset,
} from "./charset.js";
export { detectEncoding, parseXml, type DetectedEncoding } from "./parse.js";
export { serializeXml } from "./serialize.js";
export { advanceLineState, remapIndent } from "./remap-indent.js";
export { formatXml, renderXml } from "./format.js";
