/*
Purpose: list the environment directories of a catalog and summarize them in one hash.
Assumptions: environments live exactly at <root>/<category>/<leaf>; listing and stat are
cheap compared to a full scan, so the fingerprint can be recomputed on every read.
Usage: const { fingerprint } = await computeCatalogFingerprint(root).
*/

import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fg from "fast-glob";

import { CatalogReadError } from "../core/errors.js";

import { COMPOSE_FILE_NAMES } from "./compose.js";
import type { CatalogFingerprint } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ComposeEntry = {
  id: string;
  category: string;
  leaf: string;
  dir: string;
  composePath: string;
  composeFile: string;
  signature: string;
};

const COMPOSE_PATTERN = `*/*/{${COMPOSE_FILE_NAMES.join(",")}}`;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function listComposeEntries(catalogRoot: string): Promise<ComposeEntry[]> {
  const root = path.resolve(catalogRoot);
  await assertCatalogRoot(root);

  // Unreadable subtrees are skipped (suppressErrors); symlinked directories are not
  // followed, so the fixed depth also bounds any link cycle.
  const matches = await fg(COMPOSE_PATTERN, {
    cwd: root,
    onlyFiles: true,
    stats: true,
    dot: false,
    deep: 3,
    followSymbolicLinks: false,
    suppressErrors: true,
  });

  const byId = new Map<string, ComposeEntry>();
  for (const match of matches) {
    const [category, leaf, composeFile] = match.path.split("/");
    if (!category || !leaf || !composeFile) continue;

    const id = `${category}/${leaf}`;
    const existing = byId.get(id);
    if (existing && composePriority(existing.composeFile) <= composePriority(composeFile)) {
      continue;
    }

    const dir = path.join(root, category, leaf);
    const composePath = path.join(dir, composeFile);
    const stats = match.stats ?? (await statOrNull(composePath));
    if (!stats) continue;

    byId.set(id, {
      id,
      category,
      leaf,
      dir,
      composePath,
      composeFile,
      signature: contentSignature(stats),
    });
  }

  return [...byId.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export function contentSignature(stats: { mtimeMs: number; size: number }): string {
  return `${Math.trunc(stats.mtimeMs)}:${stats.size}`;
}

export function fingerprintOf(entries: Array<{ id: string; signature: string }>): string {
  const lines = entries
    .map((entry) => `${entry.id}\t${entry.signature}`)
    .sort()
    .join("\n");
  return createHash("sha256").update(lines, "utf8").digest("hex");
}

export async function computeCatalogFingerprint(catalogRoot: string): Promise<CatalogFingerprint> {
  const entries = await listComposeEntries(catalogRoot);
  return {
    fingerprint: fingerprintOf(entries),
    environments: entries.length,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function assertCatalogRoot(root: string): Promise<void> {
  try {
    const stat = await fs.stat(root);
    if (!stat.isDirectory()) {
      throw new CatalogReadError(`Catalog root is not a directory: ${root}`, root);
    }
  } catch (err) {
    if (err instanceof CatalogReadError) throw err;
    throw new CatalogReadError(`Catalog root is not readable: ${root}`, root, err);
  }
}

function composePriority(fileName: string): number {
  const index = COMPOSE_FILE_NAMES.findIndex((name) => name === fileName);
  return index === -1 ? COMPOSE_FILE_NAMES.length : index;
}

async function statOrNull(filePath: string): Promise<{ mtimeMs: number; size: number } | null> {
  try {
    return await fs.stat(filePath);
  } catch {
    return null;
  }
}
