import { Command, InvalidArgumentError } from "commander";

import { createAppContext, type AppContext, type CreateAppContextInput } from "../app/context.js";
import { CatalogReadError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import {
  listCommand,
  refreshCommand,
  runningCommand,
  showCommand,
  statsCommand,
  type ListCommandOptions,
} from "./environments.js";
import {
  imagesCommand,
  pullCommand,
  startCommand,
  stopCommand,
  waitCommand,
} from "./operations.js";
import { serveCommand } from "./serve.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliDeps = {
  createContext?: (input: CreateAppContextInput) => AppContext;
};

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

const DEFAULT_WAIT_SECONDS = 60;

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildCli(deps: CliDeps = {}): Command {
  const program = new Command();
  const createContext = deps.createContext ?? createAppContext;

  const withContext = async (run: (ctx: AppContext) => Promise<void>): Promise<void> => {
    const globals = program.opts<GlobalOptions>();
    const ctx = createContext({ explicitConfigPath: globals.config });
    try {
      await run(ctx);
    } catch (err) {
      throw toUserFacing(err, ctx);
    } finally {
      ctx.close();
    }
  };

  program
    .name("vulhub-console")
    .description("Browse, start and stop vulnerable-service environments from a local catalog")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Config file (defaults to $VULHUB_CONSOLE_HOME/config.yaml, else ~/.vulhub-console/config.yaml)",
    )
    .option("--debug", "Show error causes and stacks", false);

  program
    .command("list")
    .description("List environments (served from the cache when the catalog is unchanged)")
    .option("--refresh", "Force a full rescan", false)
    .option("--json", "Print JSON", false)
    .option("--category <name>", "Only this category")
    .option("--status <status>", "Only running, stopped or unknown")
    .action(async (opts: ListCommandOptions) => {
      await withContext((ctx) => listCommand(ctx, opts));
    });

  program
    .command("refresh")
    .description("Rescan the catalog and rebuild the cache")
    .action(async () => {
      await withContext((ctx) => refreshCommand(ctx));
    });

  program
    .command("start")
    .description("Start an environment")
    .argument("<id>", "Environment id, e.g. nginx/CVE-2021-23017")
    .action(async (id: string) => {
      await withContext((ctx) => startCommand(ctx, id));
    });

  program
    .command("stop")
    .description("Stop an environment")
    .argument("<id>", "Environment id")
    .action(async (id: string) => {
      await withContext((ctx) => stopCommand(ctx, id));
    });

  program
    .command("images")
    .description("Show which images of an environment are missing locally")
    .argument("<id>", "Environment id")
    .action(async (id: string) => {
      await withContext((ctx) => imagesCommand(ctx, id));
    });

  program
    .command("pull")
    .description("Pull the missing images of an environment")
    .argument("<id>", "Environment id")
    .action(async (id: string) => {
      await withContext((ctx) => pullCommand(ctx, id));
    });

  program
    .command("stats")
    .description("Summarize the catalog")
    .option("--json", "Print JSON", false)
    .action(async (opts: { json: boolean }) => {
      await withContext((ctx) => statsCommand(ctx, opts));
    });

  program
    .command("running")
    .description("List running containers")
    .action(async () => {
      await withContext((ctx) => runningCommand(ctx));
    });

  program
    .command("show")
    .description("Show an environment's composition, exploits and documentation")
    .argument("<id>", "Environment id")
    .action(async (id: string) => {
      await withContext((ctx) => showCommand(ctx, id));
    });

  program
    .command("wait")
    .description("Wait until an environment accepts TCP connections")
    .argument("<id>", "Environment id")
    .option("--timeout <seconds>", "Give up after this many seconds", parseNonNegativeInt, DEFAULT_WAIT_SECONDS)
    .action(async (id: string, opts: { timeout: number }) => {
      await withContext((ctx) => waitCommand(ctx, id, opts.timeout));
    });

  program
    .command("serve")
    .description("Serve the JSON/SSE API on localhost")
    .option("--port <n>", "Port (default from config)", parseNonNegativeInt)
    .option("--host <host>", "Host (default from config)")
    .action(async (opts: { port?: number; host?: string }) => {
      await withContext((ctx) => serveCommand(ctx, { port: opts.port, host: opts.host }));
    });

  return program;
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

function toUserFacing(err: unknown, ctx: AppContext): unknown {
  if (err instanceof CatalogReadError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.catalog,
      title: "Catalog not readable.",
      message: err.message,
      hint: `Set catalog_root in ${ctx.configPath ?? "the config file"} or export VULHUB_PATH.`,
      cause: err,
    });
  }
  return err;
}
