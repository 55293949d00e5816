import type { IndentOptions } from "../../core/types.js";

export type CliError = Error & { code: string };

export const makeCliError = (code: string, message: string): CliError => {
  const error = new Error(message) as CliError;
  error.code = code;
  return error;
};

export interface ParsedArgs {
  positionals: string[];
  flags: Record<string, string>;
}

export const parseArgs = (args: string[]): ParsedArgs => {
  const positionals: string[] = [];
  const flags: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }
    const name = token.slice(2);
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw makeCliError("CLI_ARG_MISSING", `Missing value for --${name}`);
    }
    flags[name] = value;
    i += 1;
  }
  return { positionals, flags };
};

export const assertKnownFlags = (flags: Record<string, string>, known: readonly string[]): void => {
  for (const name of Object.keys(flags)) {
    if (!known.includes(name)) {
      throw makeCliError("CLI_ARG_FORMAT", `Unknown argument: --${name}`);
    }
  }
};

/** `4` is a width, `tab` a tab character, anything else a literal unit (`\t` unescaped). */
export const parseIndentFlag = (value: string): number | string => {
  if (/^\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  if (value === "tab") {
    return "\t";
  }
  return value.replace(/\\t/g, "\t");
};

export const parseBooleanFlag = (name: string, value: string): boolean => {
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  throw makeCliError("CLI_ARG_FORMAT", `--${name} expects true or false, got: ${value}`);
};

export const readIndentFlags = (flags: Record<string, string>): IndentOptions => {
  const options: IndentOptions = {};
  if (flags["json-indent"] !== undefined) {
    options.json_indent = parseIndentFlag(flags["json-indent"]);
  }
  if (flags["json-sortkeys"] !== undefined) {
    options.json_sortkeys = parseBooleanFlag("json-sortkeys", flags["json-sortkeys"]);
  }
  if (flags["xml-indent"] !== undefined) {
    options.xml_indent = parseIndentFlag(flags["xml-indent"]);
  }
  return options;
};
