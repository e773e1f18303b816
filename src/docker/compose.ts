/*
Purpose: drive `docker compose` and `docker pull` as child processes.
Assumptions: the compose command runs from the environment directory so compose labels
its containers with that directory; stderr text is the only failure detail compose gives.
Usage: const result = await composeUp(runner, command, env, { timeoutMs }).
*/

import { execa } from "execa";

import { DockerError, RuntimeUnavailableError } from "../core/errors.js";

import { isDockerUnavailableError } from "./docker.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  cwd?: string;
  timeoutMs?: number;
};

export type CommandRunner = (
  file: string,
  args: string[],
  opts?: CommandOptions,
) => Promise<CommandResult>;

export type LineStreamer = (file: string, args: string[]) => AsyncIterable<string>;

export type ComposeTarget = {
  dir: string;
  composePath: string;
};

export type ComposeFailure = {
  portConflict: boolean;
  ports: number[];
  message: string;
};

const PORT_CONFLICT_MARKERS = ["port is already allocated", "address already in use"];

// =============================================================================
// PROCESS RUNNERS
// =============================================================================

/**
 * Runs a command to completion. Non-zero exits come back as results; a missing binary
 * or an unreachable daemon is thrown as RuntimeUnavailableError.
 */
export const runCommand: CommandRunner = async (file, args, opts = {}) => {
  try {
    const res = await execa(file, args, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs,
      stdio: "pipe",
      reject: false,
    });
    if (res.exitCode === undefined) {
      throw toCommandError(file, args, res);
    }
    return { exitCode: res.exitCode, stdout: res.stdout, stderr: res.stderr };
  } catch (err) {
    throw toCommandError(file, args, err);
  }
};

/** Yields the merged stdout/stderr lines of a command; throws when it exits non-zero. */
export async function* streamCommandLines(file: string, args: string[]): AsyncGenerator<string> {
  const subprocess = execa(file, args, { all: true, stdin: "ignore" });
  try {
    for await (const line of subprocess.iterable({ from: "all" })) {
      const trimmed = line.trimEnd();
      if (trimmed) yield trimmed;
    }
    await subprocess;
  } catch (err) {
    throw toCommandError(file, args, err);
  }
}

// =============================================================================
// COMPOSE COMMANDS
// =============================================================================

const COMPOSE_CANDIDATES: string[][] = [["docker", "compose"], ["docker-compose"]];

/** Prefers the compose plugin, then the standalone binary. */
export async function detectComposeCommand(run: CommandRunner): Promise<string[]> {
  const failures: string[] = [];
  for (const candidate of COMPOSE_CANDIDATES) {
    const [file, ...prefix] = candidate;
    if (!file) continue;
    try {
      const res = await run(file, [...prefix, "version"], { timeoutMs: 30_000 });
      if (res.exitCode === 0) return candidate;
      failures.push(`${candidate.join(" ")}: exit ${res.exitCode}`);
    } catch (err) {
      if (!(err instanceof RuntimeUnavailableError)) throw err;
      failures.push(`${candidate.join(" ")}: ${err.message}`);
    }
  }
  throw new RuntimeUnavailableError(`No compose command found (${failures.join("; ")})`);
}

export async function composeUp(
  run: CommandRunner,
  command: readonly string[],
  target: ComposeTarget,
  opts: { timeoutMs?: number } = {},
): Promise<CommandResult> {
  return runCompose(run, command, target, ["up", "-d"], opts);
}

export async function composeDown(
  run: CommandRunner,
  command: readonly string[],
  target: ComposeTarget,
  opts: { timeoutMs?: number } = {},
): Promise<CommandResult> {
  return runCompose(run, command, target, ["down"], opts);
}

export function classifyComposeFailure(result: CommandResult): ComposeFailure {
  const text = `${result.stderr}\n${result.stdout}`;
  const lower = text.toLowerCase();
  const portConflict = PORT_CONFLICT_MARKERS.some((marker) => lower.includes(marker));
  const detail = lastMeaningfulLine(result.stderr) || lastMeaningfulLine(result.stdout);

  return {
    portConflict,
    ports: portConflict ? portsInMessage(text) : [],
    message: detail || `compose exited with code ${result.exitCode}`,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runCompose(
  run: CommandRunner,
  command: readonly string[],
  target: ComposeTarget,
  args: string[],
  opts: { timeoutMs?: number },
): Promise<CommandResult> {
  const [file, ...prefix] = command;
  if (!file) {
    throw new RuntimeUnavailableError("Compose command is empty");
  }
  return run(file, [...prefix, "-f", target.composePath, ...args], {
    cwd: target.dir,
    timeoutMs: opts.timeoutMs,
  });
}

// "Bind for 0.0.0.0:8080 failed" and "listen tcp 0.0.0.0:8080: bind" both name the host port.
function portsInMessage(text: string): number[] {
  const ports: number[] = [];
  for (const match of text.matchAll(/:(\d{1,5})(?:\s+failed|:\s*bind)/g)) {
    const port = Number.parseInt(match[1] ?? "", 10);
    if (port > 0 && port <= 65_535 && !ports.includes(port)) ports.push(port);
  }
  return ports;
}

function lastMeaningfulLine(text: string): string {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  return lines[lines.length - 1] ?? "";
}

function toCommandError(
  file: string,
  args: string[],
  err: unknown,
): RuntimeUnavailableError | DockerError {
  if (err instanceof RuntimeUnavailableError || err instanceof DockerError) return err;

  const details = resolveExecaErrorDetails(err);
  const commandText = [file, ...args].join(" ");
  const detail = lastMeaningfulLine(details.stderr) || details.message;

  if (isDockerUnavailableError(details)) {
    return new RuntimeUnavailableError(`${commandText} could not reach Docker: ${detail}`, err);
  }
  return new DockerError(`${commandText} failed: ${detail}`, err);
}

function resolveExecaErrorDetails(err: unknown): { message: string; stderr: string; code?: string } {
  if (!err || typeof err !== "object") {
    return { message: String(err), stderr: "" };
  }

  const shortMessage =
    "shortMessage" in err && typeof err.shortMessage === "string" ? err.shortMessage : "";
  const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
  const stderr = "stderr" in err && typeof err.stderr === "string" ? err.stderr : "";
  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;

  return { message: shortMessage || message, stderr, code };
}
