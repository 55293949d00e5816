import { formatDocument, type FormatOutcome } from "../../api.js";
import { IndentError } from "../../core/errors.js";
import {
  assertKnownFlags,
  makeCliError,
  parseArgs,
  parseBooleanFlag,
  readIndentFlags,
} from "../core/args.js";
import { resolveSettings } from "../core/settings-store.js";
import { loadSource, writeFormatted } from "../core/source-loader.js";

type WriteLine = (line: string) => void;

const FORMAT_FLAGS = [
  "language",
  "json-indent",
  "json-sortkeys",
  "xml-indent",
  "encoding",
  "settings",
  "write",
] as const;

const emitError = (writeLine: WriteLine, error: unknown): number => {
  const code =
    error instanceof IndentError
      ? error.code
      : typeof error === "object" && error !== null && "code" in error
        ? String(error.code)
        : "CLI_ERROR";
  const message = error instanceof Error ? error.message : "Unknown CLI error.";
  writeLine("RESULT:ERROR");
  writeLine(`ERROR_CODE:${code}`);
  writeLine(`ERROR_MSG_JSON:${JSON.stringify(message)}`);
  return 1;
};

const emitWriteResult = (writeLine: WriteLine, outcome: FormatOutcome, wrote: string | null): number => {
  writeLine("RESULT:OK");
  writeLine(`STATUS:${outcome.status}`);
  writeLine(`WROTE:${wrote ?? "NONE"}`);
  return 0;
};

export const runFormatCommand = (
  argv: string[],
  writeLine: WriteLine = (line) => {
    process.stdout.write(`${line}\n`);
  }
): number => {
  try {
    const { positionals, flags } = parseArgs(argv);
    assertKnownFlags(flags, FORMAT_FLAGS);
    const [file, ...extra] = positionals;
    if (!file) {
      throw makeCliError("CLI_FILE_REQUIRED", "Missing file argument. Use format <file>.");
    }
    if (extra.length > 0) {
      throw makeCliError("CLI_ARG_FORMAT", `Unexpected argument: ${extra[0]}`);
    }
    const write = flags.write === undefined ? false : parseBooleanFlag("write", flags.write);
    const options = { ...resolveSettings(flags.settings), ...readIndentFlags(flags) };
    const source = loadSource(file, flags.language);

    const outcome = formatDocument({
      source: source.bytes,
      language: source.language,
      options,
      encoding: flags.encoding,
    });
    if (outcome.status === "failed") {
      return emitError(writeLine, outcome.error);
    }
    if (!write) {
      writeLine(outcome.text);
      return 0;
    }
    if (outcome.status === "unsupported") {
      return emitWriteResult(writeLine, outcome, null);
    }
    writeFormatted(source.path, outcome.text, outcome.encoding);
    return emitWriteResult(writeLine, outcome, source.path);
  } catch (error) {
    return emitError(writeLine, error);
  }
};
