import type { FormatOutcome } from "../../api.js";
import type { IndentOptions } from "../../core/types.js";

export interface Preview {
  lines: string[];
  status: string;
  writable: boolean;
}

const INDENT_CYCLE: Array<number | string> = [2, 4, "\t"];

export const describeIndent = (value: number | string | undefined, fallback: number): string => {
  const resolved = value ?? fallback;
  if (typeof resolved === "number") {
    return `${resolved} spaces`;
  }
  return resolved === "\t" ? "tab" : JSON.stringify(resolved);
};

/**
 * Moves both indent options to the next entry of the 2 / 4 / tab cycle.
 */
export const cycleIndent = (options: IndentOptions): IndentOptions => {
  const current = options.xml_indent ?? options.json_indent ?? 4;
  const index = INDENT_CYCLE.indexOf(current);
  const next = INDENT_CYCLE[(index + 1) % INDENT_CYCLE.length];
  return { ...options, json_indent: next, xml_indent: next };
};

export const toggleSortKeys = (options: IndentOptions): IndentOptions => ({
  ...options,
  json_sortkeys: !(options.json_sortkeys ?? false),
});

export const buildPreview = (outcome: FormatOutcome): Preview => {
  switch (outcome.status) {
    case "formatted":
      return {
        lines: outcome.text.split("\n"),
        status: `formatted ${outcome.kind} (${outcome.encoding})`,
        writable: true,
      };
    case "unsupported":
      return {
        lines: outcome.text.split("\n"),
        status: "not xml or json; left unchanged",
        writable: false,
      };
    case "failed":
      return {
        lines: [],
        status: outcome.kind === "json" ? `Invalid JSON: ${outcome.error.message}` : outcome.error.message,
        writable: false,
      };
  }
};
