/*
Purpose: render CLI errors as labelled lines, colored when stderr is a terminal.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineLabel = { label: string; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LABELS: Partial<Record<ErrorFormatLineKind, LineLabel>> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
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
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((stackLine) => `  ${stackLine}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const label = LABELS[line.kind];
  if (!label) return line.text;
  return `${format(label.label, label.labelStyles)} ${format(line.text, label.textStyles)}`;
}
