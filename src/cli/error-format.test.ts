import { describe, expect, it } from "vitest";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Console config invalid.",
    message: "catalog_root: Required",
    hint: "Fix the config file and rerun.",
    next: "Edit ~/.vulhub-console/config.yaml",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Console config invalid.",
        "catalog_root: Required",
        "Hint: Fix the config file and rerun.",
        "Next: Edit ~/.vulhub-console/config.yaml",
      ].join("\n"),
    );
  });

  it("includes the code, cause and cause stack in debug mode", () => {
    const cause = new Error("connect ECONNREFUSED");
    cause.stack = "Error: connect ECONNREFUSED\nat fake:1:1";
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.runtime,
      title: "Runtime unreachable.",
      message: "Docker is not reachable",
      cause,
    });

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Runtime unreachable.",
        "Docker is not reachable",
        "Code: RUNTIME_ERROR",
        "Cause: Error: connect ECONNREFUSED",
        "Stack:",
        "  Error: connect ECONNREFUSED",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("summarizes unexpected errors with a debug hint", () => {
    const output = renderCliError(new Error("boom"), { stream: nonTtyStream });

    expect(output).toBe(
      ["Error: Command failed.", "boom", "Hint: Rerun with --debug for more detail."].join("\n"),
    );
  });

  it("colors labels when color is forced on", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream, useColor: true });

    expect(output.split("\n")[0]).toBe(
      "\u001b[1m\u001b[31mError:\u001b[39m\u001b[22m \u001b[1mConsole config invalid.\u001b[22m",
    );
  });

  it("leaves non-TTY output uncolored by default", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).not.toContain("\u001b[");
  });
});
