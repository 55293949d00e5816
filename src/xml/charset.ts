import { XmlError } from "../core/errors.js";

export interface Charset {
  /** Label as written in the document, lowercased. */
  label: string;
  /** Canonical WHATWG encoding name. */
  name: string;
  decode(bytes: Uint8Array): string;
  canEncode(char: string): boolean;
  encode(text: string): Uint8Array;
}

const SINGLE_BYTE_ENCODINGS = new Set([
  "ibm866",
  "iso-8859-2",
  "iso-8859-3",
  "iso-8859-4",
  "iso-8859-5",
  "iso-8859-6",
  "iso-8859-7",
  "iso-8859-8",
  "iso-8859-8-i",
  "iso-8859-10",
  "iso-8859-13",
  "iso-8859-14",
  "iso-8859-15",
  "iso-8859-16",
  "koi8-r",
  "koi8-u",
  "macintosh",
  "windows-874",
  "windows-1250",
  "windows-1251",
  "windows-1252",
  "windows-1253",
  "windows-1254",
  "windows-1255",
  "windows-1256",
  "windows-1257",
  "windows-1258",
  "x-mac-cyrillic",
]);

const REPLACEMENT_CHAR = "�";

const createDecoder = (label: string): TextDecoder => {
  try {
    return new TextDecoder(label, { fatal: true });
  } catch {
    throw new XmlError("XML_ENCODING", `Unknown encoding: ${label}`);
  }
};

const decodeWith = (decoder: TextDecoder, bytes: Uint8Array): string => {
  try {
    return decoder.decode(bytes);
  } catch {
    throw new XmlError("XML_ENCODING", `Input is not valid ${decoder.encoding}.`);
  }
};

/** UTF-16 output starts with a byte-order mark so it can be read back. */
const encodeUtf16 = (text: string, littleEndian: boolean): Uint8Array => {
  const bytes = new Uint8Array((text.length + 1) * 2);
  const view = new DataView(bytes.buffer);
  view.setUint16(0, 0xfeff, littleEndian);
  for (let i = 0; i < text.length; i += 1) {
    view.setUint16((i + 1) * 2, text.charCodeAt(i), littleEndian);
  }
  return bytes;
};

export type ByteOrder = "utf-16le" | "utf-16be";

export const detectByteOrderMark = (bytes: Uint8Array): ByteOrder | undefined => {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return "utf-16le";
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return "utf-16be";
  }
  return undefined;
};

export const isEncodingOf = (label: string, name: string): boolean => {
  try {
    return new TextDecoder(label.trim().toLowerCase()).encoding === name;
  } catch {
    return false;
  }
};

const buildByteTable = (name: string): Map<string, number> => {
  const allBytes = Uint8Array.from({ length: 256 }, (_value, index) => index);
  const decoded = new TextDecoder(name).decode(allBytes);
  const table = new Map<string, number>();
  for (let i = 0; i < decoded.length; i += 1) {
    const char = decoded[i];
    if (char !== REPLACEMENT_CHAR && !table.has(char)) {
      table.set(char, i);
    }
  }
  return table;
};

const unencodable = (char: string, label: string): XmlError =>
  new XmlError(
    "XML_ENCODING",
    `Character U+${(char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, "0")} cannot be encoded as ${label}.`
  );

export const resolveCharset = (label: string): Charset => {
  const normalized = label.trim().toLowerCase();
  const decoder = createDecoder(normalized);
  const name = decoder.encoding;
  const decode = (bytes: Uint8Array): string => decodeWith(decoder, bytes);

  if (name === "utf-8") {
    const encoder = new TextEncoder();
    return {
      label: normalized,
      name,
      decode,
      canEncode: () => true,
      encode: (text) => encoder.encode(text),
    };
  }
  if (name === "utf-16le" || name === "utf-16be") {
    return {
      label: normalized,
      name,
      decode,
      canEncode: () => true,
      encode: (text) => encodeUtf16(text, name === "utf-16le"),
    };
  }
  if (SINGLE_BYTE_ENCODINGS.has(name)) {
    const table = buildByteTable(name);
    return {
      label: normalized,
      name,
      decode,
      canEncode: (char) => table.has(char),
      encode: (text) => {
        const bytes = new Uint8Array(text.length);
        for (let i = 0; i < text.length; i += 1) {
          const byte = table.get(text[i]);
          if (byte === undefined) {
            throw unencodable(text[i], normalized);
          }
          bytes[i] = byte;
        }
        return bytes;
      },
    };
  }
  // Multi-byte legacy encodings decode fine but have no encoder available.
  return {
    label: normalized,
    name,
    decode,
    canEncode: () => true,
    encode: () => {
      throw new XmlError("XML_ENCODING", `Writing ${normalized} output is not supported.`);
    },
  };
};
