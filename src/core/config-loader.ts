import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import {
  CATALOG_ROOT_ENV,
  ConsoleConfigSchema,
  DEFAULT_CATALOG_ROOT,
  type ConsoleConfig,
} from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { defaultConfigPath, type PathsContext } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResolveConsoleConfigArgs = {
  paths: PathsContext;
  explicitConfigPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export type ResolvedConsoleConfig = {
  config: ConsoleConfig;
  // null when no file was found and defaults were used.
  configPath: string | null;
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Check the --config path, or omit it to use the defaults.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (error instanceof yaml.YAMLException) {
    return { line: error.mark.line + 1, column: error.mark.column + 1 };
  }
  return null;
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Console config missing.",
    message: `Console config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Console config invalid.",
    message: `Console config at ${configPath} is invalid.\n${cause.message}`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadConsoleConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): ConsoleConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read console config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw) ?? {};
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc, { file: absolutePath, trail: [], env });
    const parsed = ConsoleConfigSchema.safeParse(applyCatalogRootDefault(expanded, env));
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(details, parsed.error);
    }

    // Relative paths resolve against the config file, not the caller's cwd.
    const configDir = path.dirname(absolutePath);
    return resolveConfigPaths(parsed.data, configDir);
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

export function defaultConsoleConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ConsoleConfig {
  const config = ConsoleConfigSchema.parse(applyCatalogRootDefault({}, env));
  return resolveConfigPaths(config, cwd);
}

export function resolveConsoleConfig(args: ResolveConsoleConfigArgs): ResolvedConsoleConfig {
  const env = args.env ?? process.env;

  if (args.explicitConfigPath) {
    const configPath = path.resolve(args.explicitConfigPath);
    return { config: loadConsoleConfig(configPath, env), configPath };
  }

  const homeConfig = defaultConfigPath(args.paths);
  if (fs.existsSync(homeConfig)) {
    return { config: loadConsoleConfig(homeConfig, env), configPath: homeConfig };
  }

  return { config: defaultConsoleConfig(env, args.cwd), configPath: null };
}

// =============================================================================
// INTERNALS
// =============================================================================

function applyCatalogRootDefault(doc: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!doc || typeof doc !== "object" || Array.isArray(doc)) {
    return doc;
  }
  if ("catalog_root" in doc) {
    return doc;
  }

  return { ...doc, catalog_root: env[CATALOG_ROOT_ENV] ?? DEFAULT_CATALOG_ROOT };
}

function resolveConfigPaths(config: ConsoleConfig, baseDir: string): ConsoleConfig {
  return {
    ...config,
    catalog_root: path.resolve(baseDir, config.catalog_root),
    ...(config.cache_path ? { cache_path: path.resolve(baseDir, config.cache_path) } : {}),
  };
}
