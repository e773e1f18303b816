import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterAll, afterEach, beforeAll, beforeEach } from "vitest";

// =============================================================================
// CONSOLE HOME ISOLATION
// =============================================================================

// Nothing under test may read or write the developer's real ~/.vulhub-console.
const ISOLATED_KEYS = ["VULHUB_CONSOLE_HOME", "VULHUB_PATH", "NO_COLOR", "FORCE_COLOR"] as const;

let isolatedHome = "";
let saved: Partial<Record<(typeof ISOLATED_KEYS)[number], string>> = {};

beforeAll(() => {
  isolatedHome = fs.mkdtempSync(path.join(os.tmpdir(), "vulhub-console-home-"));
});

beforeEach(() => {
  saved = {};
  for (const key of ISOLATED_KEYS) {
    const value = process.env[key];
    if (value !== undefined) saved[key] = value;
    delete process.env[key];
  }
  process.env.VULHUB_CONSOLE_HOME = isolatedHome;
});

afterEach(() => {
  for (const key of ISOLATED_KEYS) {
    const value = saved[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

afterAll(() => {
  fs.rmSync(isolatedHome, { recursive: true, force: true });
});
