/*
Purpose: render CLI errors to stderr text with optional color.
Assumptions: non-TTY streams and NO_COLOR disable color.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const LINE_LABELS: Partial<Record<ErrorFormatLine["kind"], string>> = {
  hint: "Hint:",
  next: "Next:",
  code: "Code:",
  name: "Name:",
  cause: "Cause:",
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const useColor = resolveColorEnabled({
    stream: options.stream ?? process.stderr,
    useColor: options.useColor,
  });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "message") {
    return line.text;
  }
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((entry) => `  ${entry}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const label = LINE_LABELS[line.kind] ?? "";
  if (line.kind === "hint") return `${format(label, ["yellow"])} ${line.text}`;
  if (line.kind === "next") return `${format(label, ["cyan"])} ${line.text}`;
  return `${format(label, ["dim"])} ${format(line.text, ["dim"])}`;
}
