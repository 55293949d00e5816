export interface StripCommentsOptions {
  /** Drop whitespace outside string literals as well. */
  stripWhitespace?: boolean;
}

const isLineBreak = (ch: string): boolean => ch === "\n" || ch === "\r";

const isJsonWhitespace = (ch: string): boolean =>
  ch === " " || ch === "\t" || ch === "\n" || ch === "\r";

const precedingBackslashes = (text: string, index: number): number => {
  let count = 0;
  for (let i = index - 1; i >= 0 && text[i] === "\\"; i -= 1) {
    count += 1;
  }
  return count;
};

/**
 * Removes `//` and `/* *\/` comments from JSON-with-comments text.
 * String literals are copied through untouched; an unterminated comment
 * swallows the rest of the input.
 */
export const stripComments = (raw: string, options: StripCommentsOptions = {}): string => {
  const stripWhitespace = options.stripWhitespace ?? false;
  let inString = false;
  let inBlockComment = false;
  let inLineComment = false;
  let out = "";

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i];

    if (inLineComment) {
      if (isLineBreak(ch)) {
        inLineComment = false;
        if (!stripWhitespace) {
          out += ch;
        }
      }
      continue;
    }

    if (inBlockComment) {
      if (ch === "*" && raw[i + 1] === "/") {
        inBlockComment = false;
        i += 1;
      }
      continue;
    }

    if (inString) {
      out += ch;
      if (ch === '"' && precedingBackslashes(raw, i) % 2 === 0) {
        inString = false;
      }
      continue;
    }

    if (ch === '"' && precedingBackslashes(raw, i) % 2 === 0) {
      inString = true;
      out += ch;
      continue;
    }
    if (ch === "/" && raw[i + 1] === "*") {
      inBlockComment = true;
      i += 1;
      continue;
    }
    if (ch === "/" && raw[i + 1] === "/") {
      inLineComment = true;
      i += 1;
      continue;
    }
    if (stripWhitespace && isJsonWhitespace(ch)) {
      continue;
    }
    out += ch;
  }

  return out;
};
