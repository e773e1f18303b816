/*
Purpose: detect the non-composition artifacts of an environment directory (exploit
scripts, screenshots, READMEs).
Assumptions: only the top level and the well-known exploit subdirectories are inspected.
Usage: const artifacts = await inspectArtifacts(envDir).
*/

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import { minimatch } from "minimatch";

import { isMissingFile } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type EnvironmentArtifacts = {
  hasExploit: boolean;
  hasScreenshots: boolean;
  hasReadme: boolean;
  hasReadmeZh: boolean;
};

// =============================================================================
// PATTERNS
// =============================================================================

export const EXPLOIT_DIR_NAMES = ["exploit", "exploits", "poc", "pocs"] as const;

export const EXPLOIT_FILE_PATTERNS = [
  "*exploit*.py",
  "*exploit*.sh",
  "poc.py",
  "poc.sh",
  "exp.py",
  "PoC.py",
] as const;

export const EXPLOIT_SCRIPT_EXTENSIONS: readonly string[] = [".py", ".sh", ".rb", ".go", ".c", ".cpp"];

export const SCREENSHOT_EXTENSIONS: readonly string[] = [
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".webp",
  ".bmp",
  ".svg",
];

export const README_NAMES = ["README.md", "README.MD"] as const;
export const README_ZH_NAMES = ["README.zh-cn.md", "README.zh-CN.md", "README_zh.md"] as const;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function inspectArtifacts(envDir: string): Promise<EnvironmentArtifacts> {
  const entries = await readDirEntries(envDir);
  const files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  const dirs = new Set(entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name));

  return {
    hasExploit:
      EXPLOIT_DIR_NAMES.some((name) => dirs.has(name)) || files.some(isExploitFileName),
    hasScreenshots: files.some(isScreenshotFileName),
    hasReadme: README_NAMES.some((name) => files.includes(name)),
    hasReadmeZh: README_ZH_NAMES.some((name) => files.includes(name)),
  };
}

/** Exploit scripts with paths relative to `envDir`, subdirectory scripts first. */
export async function listExploitFiles(envDir: string): Promise<string[]> {
  const found: string[] = [];

  for (const dirName of EXPLOIT_DIR_NAMES) {
    const entries = await readDirEntries(path.join(envDir, dirName));
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const ext = path.extname(entry.name);
      if (EXPLOIT_SCRIPT_EXTENSIONS.includes(ext)) {
        found.push(path.posix.join(dirName, entry.name));
      }
    }
  }

  const topLevel = await readDirEntries(envDir);
  for (const entry of topLevel) {
    if (entry.isFile() && isExploitFileName(entry.name)) {
      found.push(entry.name);
    }
  }

  return found;
}

export async function listScreenshots(envDir: string): Promise<string[]> {
  const entries = await readDirEntries(envDir);
  return entries
    .filter((entry) => entry.isFile() && isScreenshotFileName(entry.name))
    .map((entry) => entry.name)
    .sort();
}

export function isExploitFileName(name: string): boolean {
  return EXPLOIT_FILE_PATTERNS.some((pattern) => minimatch(name, pattern));
}

export function isScreenshotFileName(name: string): boolean {
  const ext = path.extname(name).toLowerCase();
  return SCREENSHOT_EXTENSIONS.includes(ext);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readDirEntries(dir: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  } catch (err) {
    // Missing or unreadable directories contribute nothing.
    if (isMissingFile(err) || hasErrorCode(err, SKIPPABLE_DIR_ERRORS)) return [];
    throw err;
  }
}

const SKIPPABLE_DIR_ERRORS = ["ENOTDIR", "EACCES", "EPERM"];

function hasErrorCode(err: unknown, codes: string[]): boolean {
  if (typeof err !== "object" || err === null || !("code" in err)) return false;
  return typeof err.code === "string" && codes.includes(err.code);
}
