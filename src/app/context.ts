/**
 * AppContext wires config, paths, logging, the cache store, the runtime probe and the
 * reconciliation engine for the CLI and the API server.
 * Purpose: one explicit object instead of module-level singletons.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ explicitConfigPath }); ...; ctx.close().
 */

import { CacheStore } from "../cache/cache-store.js";
import type { ConsoleConfig } from "../core/config.js";
import { resolveConsoleConfig } from "../core/config-loader.js";
import { JsonlLogger, type EventLog } from "../core/logger.js";
import {
  consoleLogPath,
  createPathsContext,
  defaultCachePath,
  type PathsContext,
} from "../core/paths.js";
import { DockerRuntimeProbe } from "../docker/probe.js";
import type { RuntimeProbe } from "../engine/ports.js";
import { ReconciliationEngine } from "../engine/reconciler.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  config: ConsoleConfig;
  configPath: string | null;
  paths: PathsContext;
  cachePath: string;
  logger: EventLog;
  store: CacheStore;
  probe: RuntimeProbe;
  engine: ReconciliationEngine;
  close: () => void;
};

export type CreateAppContextInput = {
  explicitConfigPath?: string;
  consoleHome?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  // Test seams.
  config?: ConsoleConfig;
  probe?: RuntimeProbe;
  logger?: EventLog;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput = {}): AppContext {
  const env = input.env ?? process.env;
  const paths = createPathsContext({ consoleHome: input.consoleHome, env });

  const resolved = input.config
    ? { config: input.config, configPath: null }
    : resolveConsoleConfig({
        paths,
        explicitConfigPath: input.explicitConfigPath,
        env,
        cwd: input.cwd,
      });
  const config = resolved.config;

  let fileLogger: JsonlLogger | null = null;
  let logger: EventLog;
  if (input.logger) {
    logger = input.logger;
  } else {
    fileLogger = new JsonlLogger(consoleLogPath(paths), { component: "console" });
    logger = fileLogger;
  }

  const cachePath = config.cache_path ?? defaultCachePath(paths);
  const store = new CacheStore(cachePath, { logger });
  const probe =
    input.probe ??
    new DockerRuntimeProbe({
      composeCommand: config.runtime.compose_command,
      commandTimeoutMs: config.runtime.command_timeout_seconds * 1_000,
      logger,
    });

  const engine = new ReconciliationEngine({
    catalogRoot: config.catalog_root,
    store,
    probe,
    logger,
    ttlHours: config.cache.ttl_hours,
    fingerprintRecheckSeconds: config.cache.fingerprint_recheck_seconds,
  });

  return {
    config,
    configPath: resolved.configPath,
    paths,
    cachePath,
    logger,
    store,
    probe,
    engine,
    close: () => fileLogger?.close(),
  };
}
