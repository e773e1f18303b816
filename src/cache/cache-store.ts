import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import {
  CACHE_FORMAT_VERSION,
  CatalogSnapshotSchema,
  type CatalogSnapshot,
  type EnvironmentDescriptor,
} from "../catalog/types.js";
import { formatIssues } from "../core/config-loader.js";
import { CacheCorruptError } from "../core/errors.js";
import { logConsoleEvent, type EventLog } from "../core/logger.js";
import { isMissingFile } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type DescriptorMutator = (descriptor: EnvironmentDescriptor) => EnvironmentDescriptor | void;

export type CacheStoreOptions = {
  logger?: EventLog;
};

const VersionHeaderSchema = z.object({ format_version: z.unknown() });

// =============================================================================
// STORE
// =============================================================================

/**
 * Single-file snapshot store. Every write is a full-document temp-then-rename, and
 * read-modify-write cycles within this process run one at a time so concurrent
 * patches for different ids cannot drop each other's entries.
 */
export class CacheStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    public readonly cachePath: string,
    private readonly opts: CacheStoreOptions = {},
  ) {}

  /** Returns null on any cold-start condition; never throws for a bad file. */
  async load(): Promise<CatalogSnapshot | null> {
    const result = await readSnapshot(this.cachePath);
    if (result.ok) {
      return result.snapshot;
    }

    if (result.error) {
      logConsoleEvent(this.opts.logger, "cache.load.miss", {
        reason: "corrupt",
        message: result.error.message,
      });
    } else {
      logConsoleEvent(this.opts.logger, "cache.load.miss", { reason: "missing" });
    }
    return null;
  }

  async save(snapshot: CatalogSnapshot): Promise<void> {
    await this.serialize(() => writeSnapshot(this.cachePath, snapshot));
    logConsoleEvent(this.opts.logger, "cache.save", {
      environments: Object.keys(snapshot.environments).length,
    });
  }

  /**
   * Applies `mutator` to one entry of the freshest on-disk snapshot and rewrites the
   * whole file. Returns the patched descriptor, or null when the store is cold or the
   * id is not in it.
   */
  async patch(id: string, mutator: DescriptorMutator): Promise<EnvironmentDescriptor | null> {
    return this.serialize(async () => {
      const result = await readSnapshot(this.cachePath);
      if (!result.ok) return null;

      const snapshot = result.snapshot;
      const current = snapshot.environments[id];
      if (!current) return null;

      const draft: EnvironmentDescriptor = structuredClone(current);
      const next = mutator(draft) ?? draft;
      snapshot.environments[id] = { ...next, id };

      await writeSnapshot(this.cachePath, snapshot);
      return snapshot.environments[id] ?? null;
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}

// =============================================================================
// FILE IO
// =============================================================================

type ReadSnapshotResult =
  | { ok: true; snapshot: CatalogSnapshot }
  | { ok: false; error: CacheCorruptError | null };

async function readSnapshot(cachePath: string): Promise<ReadSnapshotResult> {
  let raw: string;
  try {
    raw = await fse.readFile(cachePath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return { ok: false, error: null };
    return { ok: false, error: new CacheCorruptError(`Unable to read ${cachePath}`, cachePath, err) };
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: new CacheCorruptError(`Invalid JSON in ${cachePath}`, cachePath, err) };
  }

  const header = VersionHeaderSchema.safeParse(doc);
  if (!header.success || header.data.format_version !== CACHE_FORMAT_VERSION) {
    const found = (header.success && JSON.stringify(header.data.format_version)) || "none";
    return {
      ok: false,
      error: new CacheCorruptError(
        `Cache format ${found} does not match ${CACHE_FORMAT_VERSION}`,
        cachePath,
      ),
    };
  }

  const parsed = CatalogSnapshotSchema.safeParse(doc);
  if (!parsed.success) {
    return {
      ok: false,
      error: new CacheCorruptError(
        `Invalid cache document at ${cachePath}:\n${formatIssues(parsed.error.issues)}`,
        cachePath,
        parsed.error,
      ),
    };
  }

  return { ok: true, snapshot: parsed.data };
}

async function writeSnapshot(cachePath: string, snapshot: CatalogSnapshot): Promise<void> {
  const dir = path.dirname(cachePath);
  await fse.ensureDir(dir);

  // format_version leads the document so a version bump is visible before the rest.
  const ordered: CatalogSnapshot = {
    format_version: snapshot.format_version,
    catalog_root: snapshot.catalog_root,
    catalog_fingerprint: snapshot.catalog_fingerprint,
    generated_at: snapshot.generated_at,
    environments: snapshot.environments,
  };

  const tmpPath = `${cachePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(JSON.stringify(ordered, null, 2) + "\n", "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, cachePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}
