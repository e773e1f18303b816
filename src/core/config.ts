import { z } from "zod";

const CacheSchema = z.object({
  // 0 disables the age-based fallback; the fingerprint check still applies.
  ttl_hours: z.number().nonnegative().default(24),
  fingerprint_recheck_seconds: z.number().nonnegative().default(30),
});

const RuntimeSchema = z.object({
  // Empty: probe `docker compose` then `docker-compose`.
  compose_command: z.array(z.string().min(1)).default([]),
  command_timeout_seconds: z.number().int().positive().default(300),
});

const ServerSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65_535).default(5000),
});

export const ConsoleConfigSchema = z
  .object({
    catalog_root: z.string().min(1),
    cache_path: z.string().min(1).optional(),
    cache: CacheSchema.default({}),
    runtime: RuntimeSchema.default({}),
    server: ServerSchema.default({}),
  })
  .strict();

export type ConsoleConfig = z.infer<typeof ConsoleConfigSchema>;

export const DEFAULT_CATALOG_ROOT = "./vulhub";
export const CATALOG_ROOT_ENV = "VULHUB_PATH";
