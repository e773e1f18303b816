import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  consoleHome: string;
};

export type ResolveConsoleHomeOptions = {
  consoleHome?: string;
  env?: NodeJS.ProcessEnv;
};

export const CONSOLE_HOME_ENV = "VULHUB_CONSOLE_HOME";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveConsoleHome(opts: ResolveConsoleHomeOptions = {}): string {
  if (opts.consoleHome) {
    return path.resolve(opts.consoleHome);
  }

  const env = opts.env ?? process.env;
  const fromEnv = env[CONSOLE_HOME_ENV];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  return path.join(os.homedir(), ".vulhub-console");
}

export function createPathsContext(opts: ResolveConsoleHomeOptions = {}): PathsContext {
  return { consoleHome: resolveConsoleHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function defaultConfigPath(paths: PathsContext): string {
  return path.join(paths.consoleHome, "config.yaml");
}

export function defaultCachePath(paths: PathsContext): string {
  return path.join(paths.consoleHome, "catalog-cache.json");
}

export function logsDir(paths: PathsContext): string {
  return path.join(paths.consoleHome, "logs");
}

export function consoleLogPath(paths: PathsContext): string {
  return path.join(logsDir(paths), "console.jsonl");
}
