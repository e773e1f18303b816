/*
Purpose: turn arbitrary thrown values into ordered display lines for the CLI and logs.
Assumptions: UserFacingError carries title/message/hint; everything else is summarized.
Usage: formatErrorLines(err, { mode: "short" }) then render each line.
*/

import { isUserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// FORMATTING
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (isUserFacingError(error)) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });

    if (options.mode === "debug") {
      lines.push({ kind: "code", text: error.code });
      const cause = error.cause;
      if (cause !== undefined) {
        lines.push({ kind: "cause", text: describeCause(cause) });
      }
      const stack = resolveStack(cause) ?? error.stack;
      if (stack) lines.push({ kind: "stack", text: stack });
    }

    return lines;
  }

  lines.push({ kind: "title", text: "Command failed." });
  lines.push({ kind: "message", text: formatErrorMessage(error) });

  if (options.mode === "debug") {
    if (error instanceof Error) {
      lines.push({ kind: "name", text: error.name });
    }
    const stack = resolveStack(error);
    if (stack) lines.push({ kind: "stack", text: stack });
  } else {
    lines.push({ kind: "hint", text: "Rerun with --debug for more detail." });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}

export function resolveColorEnabled(input: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (input.useColor !== undefined) return input.useColor;
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.FORCE_COLOR !== undefined && process.env.FORCE_COLOR !== "0") return true;
  return Boolean(input.stream.isTTY);
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return String(cause);
}

function resolveStack(error: unknown): string | undefined {
  if (error instanceof Error && typeof error.stack === "string") {
    return error.stack;
  }
  return undefined;
}
