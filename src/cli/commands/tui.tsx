import React, { useEffect, useMemo, useState } from "react";
import { Box, Text, render, useApp, useInput } from "ink";

import { formatDocument } from "../../api.js";
import { resolveIndentConfig } from "../../core/config.js";
import type { IndentOptions } from "../../core/types.js";
import { assertKnownFlags, makeCliError, parseArgs } from "../core/args.js";
import { buildPreview, cycleIndent, describeIndent, toggleSortKeys } from "../core/preview.js";
import { resolveSettings } from "../core/settings-store.js";
import { loadSource, writeFormatted, type LoadedSource } from "../core/source-loader.js";

const ELLIPSIS = "…";
const RESERVED_ROWS = 6;

const truncateToWidth = (value: string, width: number): string => {
  if (width <= 0) {
    return "";
  }
  if (value.length <= width) {
    return value;
  }
  if (width === 1) {
    return ELLIPSIS;
  }
  return `${value.slice(0, width - 1)}${ELLIPSIS}`;
};

export interface TuiOptions {
  file: string;
  language: string | undefined;
  settingsFile: string | undefined;
}

export const parseTuiArgs = (argv: string[]): TuiOptions => {
  const { positionals, flags } = parseArgs(argv);
  assertKnownFlags(flags, ["language", "settings"]);
  const [file, ...extra] = positionals;
  if (!file) {
    throw makeCliError("CLI_FILE_REQUIRED", "Missing file argument. Use tui <file>.");
  }
  if (extra.length > 0) {
    throw makeCliError("CLI_ARG_FORMAT", `Unexpected argument: ${extra[0]}`);
  }
  return { file, language: flags.language, settingsFile: flags.settings };
};

const PreviewApp = ({
  initialSource,
  initialOptions,
  language,
}: {
  initialSource: LoadedSource;
  initialOptions: IndentOptions;
  language: string | undefined;
}) => {
  const { exit } = useApp();
  const [terminalSize, setTerminalSize] = useState(() => ({
    columns: process.stdout.columns ?? 80,
    rows: process.stdout.rows ?? 24,
  }));
  const [source, setSource] = useState(initialSource);
  const [options, setOptions] = useState(initialOptions);
  const [scrollOffset, setScrollOffset] = useState(0);
  const [helpVisible, setHelpVisible] = useState(false);
  const [status, setStatus] = useState<string | null>(null);

  useEffect(() => {
    const updateTerminalSize = (): void => {
      setTerminalSize({
        columns: process.stdout.columns ?? 80,
        rows: process.stdout.rows ?? 24,
      });
    };
    process.stdout.on("resize", updateTerminalSize);
    return () => {
      process.stdout.off("resize", updateTerminalSize);
    };
  }, []);

  const outcome = useMemo(
    () => formatDocument({ source: source.bytes, language: source.language, options }),
    [source, options]
  );
  const preview = buildPreview(outcome);
  const visibleRows = Math.max(1, terminalSize.rows - RESERVED_ROWS - (helpVisible ? 1 : 0));
  const maxOffset = Math.max(0, preview.lines.length - visibleRows);

  useInput((input, key) => {
    try {
      if (key.escape || input === "q") {
        exit();
        return;
      }
      if (input === "h") {
        setHelpVisible((prev) => !prev);
        return;
      }
      if (key.upArrow) {
        setScrollOffset((prev) => Math.max(0, prev - 1));
        return;
      }
      if (key.downArrow) {
        setScrollOffset((prev) => Math.min(maxOffset, prev + 1));
        return;
      }
      if (input === "i") {
        const next = cycleIndent(options);
        setOptions(next);
        setStatus(`indent: ${describeIndent(next.xml_indent, 4)}`);
        return;
      }
      if (input === "s") {
        const next = toggleSortKeys(options);
        setOptions(next);
        setStatus(`sort keys: ${next.json_sortkeys ? "on" : "off"}`);
        return;
      }
      if (input === "r") {
        setSource(loadSource(source.path, language));
        setScrollOffset(0);
        setStatus("reloaded");
        return;
      }
      if (input === "w") {
        if (outcome.status !== "formatted") {
          setStatus("nothing to write");
          return;
        }
        writeFormatted(source.path, outcome.text, outcome.encoding);
        setSource(loadSource(source.path, language));
        setStatus(`wrote ${source.path}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown error";
      setStatus(message);
    }
  });

  const contentWidth = Math.max(16, terminalSize.columns - 2);
  const offset = Math.min(scrollOffset, maxOffset);
  const rows = preview.lines.slice(offset, offset + visibleRows);
  const headerText = truncateToWidth(`${source.path} | ${source.language}`, contentWidth);
  const settingsText = truncateToWidth(
    `json: ${describeIndent(options.json_indent, 4)}${options.json_sortkeys ? ", sorted" : ""} | xml: ${describeIndent(options.xml_indent, 4)}`,
    contentWidth
  );
  const statusText = truncateToWidth(`status: ${status ?? preview.status}`, contentWidth);
  const keyText = truncateToWidth(
    "keys: up/down scroll | i indent | s sort keys | w write | r reload | h help | q quit",
    contentWidth
  );
  const helpText = truncateToWidth(
    "the file is only written with w, and only when it formatted without errors.",
    contentWidth
  );

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text>{headerText}</Text>
      <Text color="gray">{settingsText}</Text>
      <Text color={outcome.status === "failed" ? "red" : "gray"}>{statusText}</Text>
      <Text color="gray">{"─".repeat(contentWidth)}</Text>
      {rows.map((line, index) => (
        <Text key={`line-${offset + index}`}>{truncateToWidth(line.replace(/\t/g, "    "), contentWidth)}</Text>
      ))}
      <Text color="gray">{truncateToWidth(`lines ${offset + 1}-${offset + rows.length} / ${preview.lines.length}`, contentWidth)}</Text>
      <Text color="yellow">{keyText}</Text>
      {helpVisible && <Text color="magenta">{helpText}</Text>}
    </Box>
  );
};

export const runTuiCommand = async (argv: string[]): Promise<number> => {
  try {
    const options = parseTuiArgs(argv);
    const settings = resolveSettings(options.settingsFile);
    resolveIndentConfig(settings);
    const source = loadSource(options.file, options.language);
    const app = render(
      <PreviewApp initialSource={source} initialOptions={settings} language={options.language} />
    );
    await app.waitUntilExit();
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown TUI error.";
    process.stderr.write(`${message}\n`);
    return 1;
  }
};
