import { XML_BASELINE_INDENT } from "../core/config.js";

type LineState = "markup" | "cdata" | "comment";

const OPENERS: Array<{ marker: string; state: LineState }> = [
  { marker: "<![CDATA[", state: "cdata" },
  { marker: "<!--", state: "comment" },
];

const CLOSERS: Record<Exclude<LineState, "markup">, string> = {
  cdata: "]]>",
  comment: "-->",
};

/**
 * State at the end of `line`, given the state it started in.
 */
export const advanceLineState = (line: string, start: LineState): LineState => {
  let state = start;
  let index = 0;
  while (index <= line.length) {
    if (state !== "markup") {
      const closer = CLOSERS[state];
      const end = line.indexOf(closer, index);
      if (end === -1) {
        return state;
      }
      state = "markup";
      index = end + closer.length;
      continue;
    }
    let next: { at: number; marker: string; state: LineState } | null = null;
    for (const opener of OPENERS) {
      const at = line.indexOf(opener.marker, index);
      if (at !== -1 && (next === null || at < next.at)) {
        next = { at, ...opener };
      }
    }
    if (next === null) {
      return state;
    }
    state = next.state;
    index = next.at + next.marker.length;
  }
  return state;
};

const remapLeadingPairs = (line: string, unit: string): string => {
  let spaces = 0;
  while (line[spaces] === " ") {
    spaces += 1;
  }
  if (spaces < 2 || line[spaces] !== "<") {
    return line;
  }
  const rest = spaces % 2 === 1 ? " " : "";
  return `${unit.repeat(Math.floor(spaces / 2))}${rest}${line.slice(spaces)}`;
};

/**
 * Replaces each two-space level on structural lines with `unit`.
 * Lines inside CDATA sections and comments, and text continuation lines,
 * are left as they are.
 */
export const remapIndent = (text: string, unit: string): string => {
  if (unit === XML_BASELINE_INDENT) {
    return text;
  }
  let state: LineState = "markup";
  return text
    .split("\n")
    .map((line) => {
      const remapped = state === "markup" ? remapLeadingPairs(line, unit) : line;
      state = advanceLineState(line, state);
      return remapped;
    })
    .join("\n");
};
