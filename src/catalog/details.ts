/*
Purpose: read the on-disk detail of one environment for display (composition text,
exploit scripts, screenshots, raw README markdown).
Assumptions: rendering (markdown to HTML, image embedding) belongs to the caller.
Usage: const details = await readEnvironmentDetails(root, id).
*/

import path from "node:path";

import fse from "fs-extra";

import { listExploitFiles, listScreenshots, README_NAMES, README_ZH_NAMES } from "./artifacts.js";
import { locateEnvironment } from "./locate.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExploitFileDetail = {
  filename: string;
  path: string;
  content: string;
  size: number;
  lines: number;
  usage: string;
};

export type EnvironmentDetails = {
  id: string;
  category: string;
  cve: string;
  compose: string;
  exploits: ExploitFileDetail[];
  screenshots: string[];
  readme: string | null;
};

export const EXPLOIT_CONTENT_LIMIT = 10_000;
const USAGE_SCAN_LINES = 20;

// Chinese documentation first, matching the catalog's primary audience.
const README_PREFERENCE = [...README_ZH_NAMES, ...README_NAMES];

// =============================================================================
// PUBLIC API
// =============================================================================

export async function readEnvironmentDetails(
  catalogRoot: string,
  id: string,
): Promise<EnvironmentDetails | null> {
  const location = await locateEnvironment(catalogRoot, id);
  if (!location) return null;

  const [category, cve] = id.split("/");
  const compose = await readTextOrEmpty(location.composePath);

  const exploits: ExploitFileDetail[] = [];
  for (const relPath of await listExploitFiles(location.dir)) {
    const content = await readTextOrEmpty(path.join(location.dir, relPath));
    if (!content) continue;
    exploits.push(describeExploit(relPath, content));
  }

  return {
    id,
    category: category ?? id,
    cve: cve ?? id,
    compose,
    exploits,
    screenshots: await listScreenshots(location.dir),
    readme: await readPreferredReadme(location.dir),
  };
}

export function describeExploit(relPath: string, content: string): ExploitFileDetail {
  const lines = content.split(/\r?\n/);
  const usage =
    lines
      .slice(0, USAGE_SCAN_LINES)
      .find((line) => /usage:|example:/i.test(line)) ?? "";

  return {
    filename: path.posix.basename(relPath),
    path: relPath,
    content: content.slice(0, EXPLOIT_CONTENT_LIMIT),
    size: content.length,
    lines: lines.length,
    usage,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readPreferredReadme(dir: string): Promise<string | null> {
  for (const name of README_PREFERENCE) {
    const candidate = path.join(dir, name);
    if (await fse.pathExists(candidate)) {
      return readTextOrEmpty(candidate);
    }
  }
  return null;
}

async function readTextOrEmpty(filePath: string): Promise<string> {
  try {
    return await fse.readFile(filePath, "utf8");
  } catch {
    return "";
  }
}
