/*
Purpose: build a fresh CatalogSnapshot from the environment tree on disk.
Assumptions: runtime state (image presence, running status) is filled in later by the
reconciler; the scan itself never talks to the container runtime.
Usage: const snapshot = await scanCatalog(root, { logger }).
*/

import path from "node:path";

import fse from "fs-extra";

import { CatalogReadError } from "../core/errors.js";
import { logConsoleEvent, type EventLog } from "../core/logger.js";
import { isoNow } from "../core/utils.js";

import { inspectArtifacts, type EnvironmentArtifacts } from "./artifacts.js";
import { parseComposition } from "./compose.js";
import { fingerprintOf, listComposeEntries, type ComposeEntry } from "./fingerprint.js";
import {
  CACHE_FORMAT_VERSION,
  type CatalogSnapshot,
  type EnvironmentDescriptor,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScanOptions = {
  logger?: EventLog;
  now?: () => string;
};

const SCAN_CONCURRENCY = 32;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function scanCatalog(
  catalogRoot: string,
  opts: ScanOptions = {},
): Promise<CatalogSnapshot> {
  const root = path.resolve(catalogRoot);
  logConsoleEvent(opts.logger, "catalog.scan.start", { catalog_root: root });

  const entries = await listComposeEntries(root);
  const environments: Record<string, EnvironmentDescriptor> = {};
  let skipped = 0;
  let degraded = 0;

  for (let offset = 0; offset < entries.length; offset += SCAN_CONCURRENCY) {
    const chunk = entries.slice(offset, offset + SCAN_CONCURRENCY);
    const descriptors = await Promise.all(chunk.map((entry) => describeEntry(entry, opts.logger)));

    for (const descriptor of descriptors) {
      if (!descriptor) {
        skipped += 1;
        continue;
      }
      if (descriptor.parse_error !== undefined) degraded += 1;
      environments[descriptor.id] = descriptor;
    }
  }

  const snapshot: CatalogSnapshot = {
    format_version: CACHE_FORMAT_VERSION,
    catalog_root: root,
    catalog_fingerprint: fingerprintOf(entries),
    generated_at: (opts.now ?? isoNow)(),
    environments,
  };

  logConsoleEvent(opts.logger, "catalog.scan.complete", {
    environments: Object.keys(environments).length,
    skipped,
    degraded,
  });

  return snapshot;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function describeEntry(
  entry: ComposeEntry,
  logger: EventLog | undefined,
): Promise<EnvironmentDescriptor | null> {
  let text: string;
  try {
    text = await fse.readFile(entry.composePath, "utf8");
  } catch (err) {
    const error = new CatalogReadError(
      `Unable to read ${entry.composePath}`,
      entry.composePath,
      err,
    );
    logConsoleEvent(logger, "catalog.read_error", { envId: entry.id, message: error.message });
    return null;
  }

  let artifacts: EnvironmentArtifacts;
  try {
    artifacts = await inspectArtifacts(entry.dir);
  } catch (err) {
    const error = new CatalogReadError(`Unable to list ${entry.dir}`, entry.dir, err);
    logConsoleEvent(logger, "catalog.read_error", { envId: entry.id, message: error.message });
    return null;
  }

  const parsed = parseComposition(text, entry.composePath);

  const descriptor: EnvironmentDescriptor = {
    id: entry.id,
    category: entry.category,
    cve: entry.leaf,
    services: parsed.ok ? parsed.composition.services : {},
    service_names: parsed.ok ? parsed.composition.serviceNames : [],
    images: parsed.ok ? parsed.composition.images : parsed.images,
    has_exploit: artifacts.hasExploit,
    has_images: false,
    status: "unknown",
    content_signature: entry.signature,
    compose_file: entry.composeFile,
    has_readme: artifacts.hasReadme,
    has_readme_zh: artifacts.hasReadmeZh,
    has_screenshots: artifacts.hasScreenshots,
    last_checked: null,
  };

  if (!parsed.ok) {
    descriptor.parse_error = parsed.error.message;
    logConsoleEvent(logger, "catalog.parse_error", {
      envId: entry.id,
      message: parsed.error.message,
    });
  }

  return descriptor;
}
