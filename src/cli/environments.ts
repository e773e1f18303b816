import type { AppContext } from "../app/context.js";
import { EnvironmentStatusSchema, type EnvironmentDescriptor } from "../catalog/types.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { formatContainerTable, formatEnvironmentTable, formatFailure, formatStats } from "./format.js";

// =============================================================================
// TYPES
// =============================================================================

export type ListCommandOptions = {
  refresh?: boolean;
  json?: boolean;
  category?: string;
  status?: string;
};

// =============================================================================
// COMMANDS
// =============================================================================

export async function listCommand(ctx: AppContext, opts: ListCommandOptions): Promise<void> {
  const statusFilter = parseStatusFilter(opts.status);
  const environments = (await ctx.engine.getEnvironments({ forceRescan: opts.refresh ?? false })).filter(
    (env) => matchesFilters(env, opts.category, statusFilter),
  );

  if (opts.json) {
    console.log(JSON.stringify(environments, null, 2));
    return;
  }

  if (environments.length === 0) {
    console.log("No environments found.");
    return;
  }

  for (const line of formatEnvironmentTable(environments)) console.log(line);
}

export async function refreshCommand(ctx: AppContext): Promise<void> {
  const environments = await ctx.engine.getEnvironments({ forceRescan: true });
  console.log(`Rescanned ${environments.length} environment(s) under ${ctx.engine.catalogRoot}.`);
}

export async function statsCommand(ctx: AppContext, opts: { json?: boolean }): Promise<void> {
  const stats = await ctx.engine.stats();
  if (opts.json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }
  for (const line of formatStats(stats)) console.log(line);
}

export async function showCommand(ctx: AppContext, id: string): Promise<void> {
  const view = await ctx.engine.describe(id);
  if (!view) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.catalog,
      title: "Environment not found.",
      message: `No environment ${id} under ${ctx.engine.catalogRoot}.`,
      hint: "Run `vulhub-console list` to see the available ids.",
    });
  }

  console.log(`${view.id} (${view.environment?.status ?? "unknown"})`);
  if (view.exploits.length > 0) {
    console.log("Exploits:");
    for (const exploit of view.exploits) {
      const usage = exploit.usage ? `  ${exploit.usage.trim()}` : "";
      console.log(`  ${exploit.path} (${exploit.lines} lines)${usage}`);
    }
  }
  if (view.screenshots.length > 0) {
    console.log(`Screenshots: ${view.screenshots.join(", ")}`);
  }
  console.log("");
  console.log(view.compose.trimEnd());
  if (view.readme) {
    console.log("");
    console.log(view.readme.trimEnd());
  }
}

export async function runningCommand(ctx: AppContext): Promise<void> {
  const result = await ctx.engine.runningContainers();
  if (!result.ok) {
    for (const line of formatFailure("running", result.error)) console.error(line);
    process.exitCode = 1;
    return;
  }

  if (result.containers.length === 0) {
    console.log("No running containers.");
    return;
  }
  for (const line of formatContainerTable(result.containers)) console.log(line);
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseStatusFilter(value: string | undefined): EnvironmentDescriptor["status"] | undefined {
  if (value === undefined) return undefined;
  const parsed = EnvironmentStatusSchema.safeParse(value);
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid status filter.",
      message: `Unknown status "${value}".`,
      hint: "Use one of: running, stopped, unknown.",
    });
  }
  return parsed.data;
}

function matchesFilters(
  env: EnvironmentDescriptor,
  category: string | undefined,
  status: EnvironmentDescriptor["status"] | undefined,
): boolean {
  if (category !== undefined && env.category !== category) return false;
  if (status !== undefined && env.status !== status) return false;
  return true;
}
